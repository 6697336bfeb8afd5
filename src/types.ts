/** A normalized token: lowercase, no punctuation, no digits, never empty */
export type Token = string;

/** Ordered token sequence for one document */
export type Document = readonly Token[];

export type DocumentId = string;

/** Document identifier -> token sequence, in insertion order */
export type Corpus = ReadonlyMap<DocumentId, Document>;

/** Token -> occurrence count within exactly one document */
export type TermCounts = ReadonlyMap<Token, number>;

export interface CorpusStats {
    totalDocs: number;
    docFrequency: ReadonlyMap<Token, number>; // How many docs contain each term
}

export interface ScoredTerm {
    term: Token;
    tf: number;
    idf: number;
    score: number;
}

/** Document identifier -> at most k terms, most salient first */
export type SalienceResult = Map<DocumentId, string[]>;

// =============================================================================
// Tabular input
// =============================================================================

export type CellValue = string | number | boolean | null | undefined;

export type DatasetRow = Readonly<Record<string, CellValue>>;

export interface Dataset {
    columns: readonly string[];
    rows: readonly DatasetRow[];
}

// =============================================================================
// Hierarchical corpus: speaker -> season -> episode -> document
// =============================================================================

export interface SeasonNode {
    season: string;
    /** Episode title -> document */
    episodes: Corpus;
}

export interface SpeakerNode {
    speaker: string;
    seasons: ReadonlyMap<string, SeasonNode>;
}

export type HierarchicalCorpus = ReadonlyMap<string, SpeakerNode>;

export type SeasonSalience =
    | { status: "ranked"; terms: SalienceResult }
    | { status: "failed"; error: Error };

/** Speaker -> season -> ranking outcome for that season's episodes */
export type HierarchicalSalience = Map<string, Map<string, SeasonSalience>>;
