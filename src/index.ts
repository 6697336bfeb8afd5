export type {
    Token,
    Document,
    DocumentId,
    Corpus,
    TermCounts,
    CorpusStats,
    ScoredTerm,
    SalienceResult,
    CellValue,
    DatasetRow,
    Dataset,
    SeasonNode,
    SpeakerNode,
    HierarchicalCorpus,
    SeasonSalience,
    HierarchicalSalience,
} from "./types";

export { tokenize, normalizeFragment, countTerms, type TokenizeOptions } from "./preprocessing/tokenize";
export { cleanSpeaker, listCleanSpeakers } from "./preprocessing/speakers";

export { createDataset, parseDataset, isMissing, readKey, requireColumns } from "./corpus/dataset";
export {
    buildSimpleCorpus,
    buildComprehensiveCorpus,
    buildCorpusFromTexts,
    DEFAULT_HIERARCHY_COLUMNS,
    type SimpleCorpusOptions,
    type ComprehensiveCorpusOptions,
    type ComprehensiveCorpusResult,
    type HierarchyColumns,
    type DroppedRows,
    type RowFilter,
    type TextSource,
} from "./corpus/build";

export {
    maxTermCount,
    termFrequency,
    computeCorpusStats,
    inverseDocumentFrequency,
    termSalience,
    createFrequencyModel,
    type FrequencyModel,
} from "./scoring/frequency";
export {
    scoreDocument,
    sortByScore,
    rankDocument,
    findMostSalient,
    rankHierarchicalCorpus,
    toRecord,
} from "./scoring/salience";

export {
    extractSalientTerms,
    extractSalientTermsFromDataset,
    extractHierarchicalSalientTerms,
    type DatasetSource,
    type HierarchicalExtraction,
} from "./pipeline";
export { DEFAULT_CONFIG, mergeConfig, loadConfigFromEnv, type SalienceConfig, type ResolvedConfig } from "./config";

export {
    SalienceError,
    ConfigurationError,
    EmptyCorpusError,
    TermNotInCorpusError,
    isSalienceError,
    type SalienceErrorCode,
} from "./errors";
export { default as Logger, type LogLevel, type TimingResult } from "./utils/logger";
