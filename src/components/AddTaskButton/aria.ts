export const aria = {
  button: {
    'aria-label': 'Add new task'
  }
};
