export { SpanExtractor } from './span-extractor';
