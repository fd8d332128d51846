export type {
    AssembledLine,
    CharacterDocument,
    CharacterRecord,
    DocumentLoader,
    ExtractionResult,
    Heading,
    HeadingLevel,
    PageCharacters,
    PageProgressCallback,
} from "./types";
export { UNTITLED } from "./types";
export { FontSizeHistogram } from "./stats/font-histogram";
export { assembleLines, candidateLines } from "./extraction/lines";
export {
    HeadingClassifier,
    DEFAULT_CLASSIFIER_CONFIG,
    type ClassifierConfig,
    type Classification,
} from "./classification/classifier";
export { HEADING_KEYWORDS, type HeadingKeywordTable, type LanguageTag } from "./classification/rules";
export { OutlineBuilder, extractHeadings, type OutlineOptions } from "./outline/builder";
export { extractFromFile, type PipelineConfig, type ExtendedExtractionResult } from "./pipeline";
export { loadPdfDocument, toCharacterRecords } from "./pdf/source";
export { serializeResult, parseResult, formatOutline } from "./output/outline-json";
export { processDirectory, runBatch, type BatchOptions, type BatchReport } from "./batch/batch";
export { loadConfig, type AppConfig } from "./config";
export { ConfigError, DocumentLoadError, OutlineParseError } from "./errors";
