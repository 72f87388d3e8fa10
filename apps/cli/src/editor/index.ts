export { TocEditor } from './toc-editor';
