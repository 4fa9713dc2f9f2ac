import { useEffect, useRef } from 'react';

/**
 * Runs `flush` whenever the page stops being visible. It can fire several
 * times in a row, so `flush` has to be idempotent.
 */
export function useBackgroundFlush(flush: () => void) {
  const latest = useRef(flush);
  latest.current = flush;

  useEffect(() => {
    function handleVisibility() {
      if (document.visibilityState === 'hidden') latest.current();
    }
    function handlePageHide() {
      latest.current();
    }
    document.addEventListener('visibilitychange', handleVisibility);
    window.addEventListener('pagehide', handlePageHide);
    return () => {
      document.removeEventListener('visibilitychange', handleVisibility);
      window.removeEventListener('pagehide', handlePageHide);
    };
  }, []);
}
