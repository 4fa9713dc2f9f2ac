export { default } from './ArchiveConfirm';
