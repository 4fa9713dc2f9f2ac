export const aria = {
  root: (title: string) => ({
    role: 'listitem',
    'aria-label': title
  }),
  archive: (title: string) => ({
    'aria-label': `Archive ${title}`
  })
};
