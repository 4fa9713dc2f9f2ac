export { default } from './TaskModal';
export { categoryOptions, choiceFor, NEW_CATEGORY } from './options';
