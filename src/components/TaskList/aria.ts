export const aria = {
  section: (name: string) => ({
    role: 'region',
    'aria-label': `${name || 'Uncategorised'} tasks`
  })
};
