import { renderHook } from '@testing-library/react';
import { describe, it, expect, vi, afterEach } from 'vitest';
import { useBackgroundFlush } from './useBackgroundFlush';

function setVisibility(state: DocumentVisibilityState) {
  Object.defineProperty(document, 'visibilityState', { configurable: true, get: () => state });
}

function hide() {
  document.dispatchEvent(new Event('visibilitychange'));
}

describe('useBackgroundFlush', () => {
  afterEach(() => {
    Reflect.deleteProperty(document, 'visibilityState');
  });

  it('flushes every time the page is hidden', () => {
    setVisibility('hidden');
    const flush = vi.fn();
    renderHook(() => useBackgroundFlush(flush));
    hide();
    hide();
    expect(flush).toHaveBeenCalledTimes(2);
  });

  it('ignores the page becoming visible', () => {
    setVisibility('visible');
    const flush = vi.fn();
    renderHook(() => useBackgroundFlush(flush));
    hide();
    expect(flush).not.toHaveBeenCalled();
  });

  it('flushes on pagehide with the latest callback', () => {
    const first = vi.fn();
    const second = vi.fn();
    const { rerender } = renderHook(({ flush }) => useBackgroundFlush(flush), {
      initialProps: { flush: first },
    });
    rerender({ flush: second });
    window.dispatchEvent(new Event('pagehide'));
    expect(first).not.toHaveBeenCalled();
    expect(second).toHaveBeenCalledTimes(1);
  });

  it('stops listening once unmounted', () => {
    setVisibility('hidden');
    const flush = vi.fn();
    const { unmount } = renderHook(() => useBackgroundFlush(flush));
    unmount();
    hide();
    window.dispatchEvent(new Event('pagehide'));
    expect(flush).not.toHaveBeenCalled();
  });
});
