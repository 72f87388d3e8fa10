export {
  TocError,
  TocParseError,
  TocValidationError,
} from './toc-error';
export type { TocValidationIssue, TocValidationResult } from './toc-error';
