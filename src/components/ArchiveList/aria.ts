export const aria = {
  root: {
    role: 'region',
    'aria-label': 'Archived tasks'
  }
};
