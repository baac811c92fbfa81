export { decodeText, loadTextFromFile, loadTextFromUrl, isRemoteSource } from './text-source.js';
export type { DecodedText, TextEncodingName } from './text-source.js';
