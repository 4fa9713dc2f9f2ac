export { default } from './AddTaskButton';
export { aria } from './aria';
