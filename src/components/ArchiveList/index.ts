export { default } from './ArchiveList';
export { aria } from './aria';
