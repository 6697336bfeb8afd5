import type { CellValue, Corpus, Dataset, DatasetRow, HierarchicalCorpus, SeasonNode, SpeakerNode, Token } from "../types";
import { tokenize, type TokenizeOptions } from "../preprocessing/tokenize";
import { cleanSpeaker } from "../preprocessing/speakers";
import { createDataset, isMissing, readKey, requireColumns } from "./dataset";
import Logger from "../utils/logger";

export interface RowFilter {
    column: string;
    value: CellValue;
}

export interface SimpleCorpusOptions {
    /** Column whose value identifies the document a row belongs to */
    idColumn: string;
    /** Column holding the raw text */
    docColumn: string;
    /** Keep only rows whose `column` equals `value` */
    filter?: RowFilter;
    tokenizer?: TokenizeOptions;
}

/**
 * Build a corpus from a dataset. Rows sharing an identifier are concatenated
 * in dataset order; rows with missing text are skipped.
 */
export function buildSimpleCorpus(dataset: Dataset, options: SimpleCorpusOptions): Corpus {
    const { idColumn, docColumn, filter, tokenizer } = options;
    requireColumns(dataset, filter ? [idColumn, docColumn, filter.column] : [idColumn, docColumn]);

    const logger = Logger.getInstance();
    const filterKey = filter ? readKey(filter.value) : undefined;
    const corpus = new Map<string, Token[]>();
    let missingIds = 0;

    for (const row of dataset.rows) {
        if (filter && (filterKey === undefined || readKey(row[filter.column]) !== filterKey)) continue;

        const text = row[docColumn];
        if (isMissing(text)) continue;

        const id = readKey(row[idColumn]);
        if (id === undefined) {
            missingIds++;
            continue;
        }

        const tokens = tokenize(String(text), tokenizer);
        const existing = corpus.get(id);
        if (existing) {
            existing.push(...tokens);
        } else {
            corpus.set(id, tokens);
        }
    }

    if (missingIds > 0) {
        logger.warn(`Dropped ${missingIds} row(s) with no value in id column "${idColumn}"`);
    }

    return corpus;
}

export interface HierarchyColumns {
    /** Transcript: episode title of the line */
    episode: string;
    /** Transcript: speaker credit */
    speaker: string;
    /** Transcript: spoken text */
    text: string;
    /** Episodes: episode title */
    title: string;
    /** Episodes: season name */
    season: string;
}

export const DEFAULT_HIERARCHY_COLUMNS: HierarchyColumns = {
    episode: "episode",
    speaker: "speaker",
    text: "quote",
    title: "title",
    season: "season",
};

export interface ComprehensiveCorpusOptions {
    columns?: Partial<HierarchyColumns>;
    /** Credit lines spoken by "A, B & C" to each of A, B and C (default: true) */
    splitSpeakers?: boolean;
    tokenizer?: TokenizeOptions;
}

export interface DroppedRows {
    /** Lines whose episode has no season metadata */
    unmatchedRows: number;
    /** Distinct episode titles missing from the metadata, in first-seen order */
    unmatchedEpisodes: string[];
    /** Lines with no speaker credit */
    missingSpeakerRows: number;
}

export interface ComprehensiveCorpusResult {
    corpus: HierarchicalCorpus;
    dropped: DroppedRows;
}

/**
 * Index episode metadata: title -> seasons it is listed under
 */
function indexSeasons(episodes: Dataset, columns: HierarchyColumns): Map<string, string[]> {
    const seasonsByTitle = new Map<string, string[]>();

    for (const row of episodes.rows) {
        const title = readKey(row[columns.title]);
        const season = readKey(row[columns.season]);
        if (title === undefined || season === undefined) continue;

        const seasons = seasonsByTitle.get(title);
        if (!seasons) {
            seasonsByTitle.set(title, [season]);
        } else if (!seasons.includes(season)) {
            seasons.push(season);
        }
    }

    return seasonsByTitle;
}

/**
 * Build the speaker → season → episode corpus by joining transcript lines to
 * episode metadata on title. Lines that cannot be joined are dropped, counted
 * and logged.
 */
export function buildComprehensiveCorpus(
    transcripts: Dataset,
    episodes: Dataset,
    options: ComprehensiveCorpusOptions = {}
): ComprehensiveCorpusResult {
    const columns: HierarchyColumns = { ...DEFAULT_HIERARCHY_COLUMNS, ...options.columns };
    const { splitSpeakers = true, tokenizer } = options;
    const logger = Logger.getInstance();

    requireColumns(transcripts, [columns.episode, columns.speaker, columns.text]);
    requireColumns(episodes, [columns.title, columns.season]);

    const seasonsByTitle = indexSeasons(episodes, columns);
    const dropped: DroppedRows = { unmatchedRows: 0, unmatchedEpisodes: [], missingSpeakerRows: 0 };

    // Joined rows partitioned by individual speaker, one row per (line, speaker, season)
    const rowsBySpeaker = new Map<string, DatasetRow[]>();
    const seasonOrder: string[] = [];

    for (const row of transcripts.rows) {
        const episode = readKey(row[columns.episode]);
        const seasons = episode === undefined ? undefined : seasonsByTitle.get(episode);
        if (seasons === undefined) {
            dropped.unmatchedRows++;
            const label = episode ?? "<missing>";
            if (!dropped.unmatchedEpisodes.includes(label)) {
                dropped.unmatchedEpisodes.push(label);
            }
            continue;
        }

        const credit = readKey(row[columns.speaker]);
        const speakers = credit === undefined ? [] : splitSpeakers ? cleanSpeaker(credit) : [credit.trim()];
        if (speakers.length === 0) {
            dropped.missingSpeakerRows++;
            continue;
        }

        for (const season of seasons) {
            if (!seasonOrder.includes(season)) {
                seasonOrder.push(season);
            }
            for (const speaker of speakers) {
                const joined: DatasetRow = { ...row, [columns.speaker]: speaker, [columns.season]: season };
                const speakerRows = rowsBySpeaker.get(speaker);
                if (speakerRows) {
                    speakerRows.push(joined);
                } else {
                    rowsBySpeaker.set(speaker, [joined]);
                }
            }
        }
    }

    if (dropped.unmatchedRows > 0) {
        const titles = dropped.unmatchedEpisodes.map(title => `"${title}"`).join(", ");
        logger.warn(`Dropped ${dropped.unmatchedRows} transcript line(s) with no season metadata for episode(s): ${titles}`);
    }
    if (dropped.missingSpeakerRows > 0) {
        logger.warn(`Dropped ${dropped.missingSpeakerRows} transcript line(s) with no speaker`);
    }

    const joinedColumns = [...new Set([...transcripts.columns, columns.season])];
    const corpus = new Map<string, SpeakerNode>();

    for (const [speaker, rows] of rowsBySpeaker) {
        const speakerDataset = createDataset(rows, joinedColumns);
        const seasons = new Map<string, SeasonNode>();

        for (const season of seasonOrder) {
            const seasonCorpus = buildSimpleCorpus(speakerDataset, {
                idColumn: columns.episode,
                docColumn: columns.text,
                filter: { column: columns.season, value: season },
                ...(tokenizer !== undefined && { tokenizer }),
            });
            if (seasonCorpus.size > 0) {
                seasons.set(season, { season, episodes: seasonCorpus });
            }
        }

        if (seasons.size > 0) {
            corpus.set(speaker, { speaker, seasons });
        }
    }

    logger.debug(`Built hierarchical corpus: ${corpus.size} speaker(s), ${seasonOrder.length} season(s)`);

    return { corpus, dropped };
}

export type TextSource = ReadonlyMap<string, string> | Readonly<Record<string, string>>;

function isTextMap(documents: TextSource): documents is ReadonlyMap<string, string> {
    return documents instanceof Map;
}

/**
 * Build a corpus from raw text keyed by document identifier
 */
export function buildCorpusFromTexts(documents: TextSource, tokenizer?: TokenizeOptions): Corpus {
    const entries = isTextMap(documents) ? [...documents.entries()] : Object.entries(documents);
    const corpus = new Map<string, Token[]>();
    for (const [id, text] of entries) {
        corpus.set(id, tokenize(text, tokenizer));
    }
    return corpus;
}
