export const aria = {
  header: {
    'aria-label': 'Task Mark header'
  },
  main: {
    'aria-label': 'Tasks'
  }
};
