export { TocTextCodec } from './toc-text-codec';
