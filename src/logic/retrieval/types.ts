/** A scored hit whose field names depend on the index it came from. */
export interface RetrievalHit {
    id?: string;
    score: number;
    fields: Record<string, unknown>;
}

export interface RetrievalOptions {
    /** Maximum number of hits returned (default 3). */
    topK?: number;
    /** Hits scoring below this are dropped (default RAG_MIN_SCORE). */
    minScore?: number;
}

export interface ElasticHit {
    _id?: string;
    _score?: number | null;
    _source?: Record<string, unknown>;
}

export interface ElasticSearchResponse {
    hits?: {
        hits?: ElasticHit[];
    };
}
