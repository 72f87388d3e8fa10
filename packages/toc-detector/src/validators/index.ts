export { TocValidator } from './toc-validator';
export type { TocValidationOptions } from './toc-validator';
