export { BookmarkWriter } from './bookmark-writer';
