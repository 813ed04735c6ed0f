export { splitIntoSentences, normalizeWhitespace, isSplitMethod, type SplitMethod } from './sentence-parser';
