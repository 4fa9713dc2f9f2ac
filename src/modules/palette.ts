export const palette = {
  urgent: '#EF4444',
  nonUrgent: '#22C55E',
  custom: '#3B82F6',
  background: '#FFFFFF',
  foreground: '#111827'
} as const;
