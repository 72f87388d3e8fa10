export { TextCleaner, roundToTolerance } from './text-cleaner';
