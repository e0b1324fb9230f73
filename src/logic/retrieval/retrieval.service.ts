import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ElasticService } from '../elastic/elastic.service';
import { GeminiService } from '../gemini/gemini.service';
import { errorMessage } from '../../utils/errors';
import { extractHitText } from './hit-text';
import { ElasticSearchResponse, RetrievalHit, RetrievalOptions } from './types';

const DEFAULT_TOP_K = 3;
const MIN_WINDOW = 10;

/**
 * Hybrid knowledge-base lookup: lexical multi_match and kNN over the query
 * embedding are fused with RRF, then re-ranked semantically. Scores seen by the
 * threshold are the re-ranker's.
 */
@Injectable()
export class RetrievalService {
    private readonly logger = new Logger(RetrievalService.name);
    private readonly textFields: string[];
    private readonly vectorField: string;
    private readonly rerankInferenceId: string;
    private readonly rerankField: string;
    private readonly defaultMinScore: number;

    constructor(
        private readonly elasticService: ElasticService,
        private readonly geminiService: GeminiService,
        configService: ConfigService,
    ) {
        this.textFields = (configService.get<string>('ELASTIC_TEXT_FIELDS') || 'title^2,content')
            .split(',')
            .map(f => f.trim())
            .filter(Boolean);
        this.vectorField = configService.get<string>('ELASTIC_VECTOR_FIELD') || 'content_vector';
        this.rerankInferenceId = configService.get<string>('ELASTIC_RERANK_INFERENCE_ID') || '.rerank-v1-elasticsearch';
        this.rerankField = configService.get<string>('ELASTIC_RERANK_FIELD') || 'content';
        this.defaultMinScore = configService.get<number>('RAG_MIN_SCORE') ?? 0.2;
    }

    async search(index: string, query: string, options: RetrievalOptions = {}): Promise<RetrievalHit[]> {
        const topK = options.topK ?? DEFAULT_TOP_K;
        const minScore = options.minScore ?? this.defaultMinScore;
        const window = Math.max(topK * 3, MIN_WINDOW);

        const queryVector = await this.embedQuery(query);
        const body = this.buildHybridQuery(query, queryVector, window);

        const response = await this.elasticService.elasticPost<ElasticSearchResponse>(
            `/${encodeURIComponent(index)}/_search`,
            body,
        );

        const hits: RetrievalHit[] = (response.hits?.hits ?? []).map(h => ({
            id: h._id,
            score: h._score ?? 0,
            fields: h._source ?? {},
        }));
        const kept = hits.filter(h => h.score >= minScore).slice(0, topK);
        this.logger.log(`index=${index} hits=${hits.length} kept=${kept.length} vector=${queryVector ? 'yes' : 'no'}`);
        return kept;
    }

    /** Search and join the text of every kept hit, one per line. */
    async retrieve(index: string, query: string, options: RetrievalOptions = {}): Promise<string> {
        return this.buildContext(await this.search(index, query, options));
    }

    buildContext(hits: RetrievalHit[]): string {
        return hits
            .map(h => extractHitText(h.fields))
            .filter(Boolean)
            .join('\n');
    }

    private async embedQuery(query: string): Promise<number[] | null> {
        try {
            const [vector] = await this.geminiService.embedTexts([query]);
            return vector && vector.length > 0 ? vector : null;
        } catch (error) {
            this.logger.warn(`Query embedding failed, searching without vectors: ${errorMessage(error)}`);
            return null;
        }
    }

    buildHybridQuery(query: string, queryVector: number[] | null, window: number) {
        const lexical = {
            standard: {
                query: {
                    multi_match: {
                        query,
                        fields: this.textFields,
                        fuzziness: 'AUTO',
                    },
                },
            },
        };

        const candidates = queryVector
            ? {
                rrf: {
                    retrievers: [
                        lexical,
                        {
                            knn: {
                                field: this.vectorField,
                                query_vector: queryVector,
                                k: window,
                                num_candidates: window * 10,
                            },
                        },
                    ],
                    rank_window_size: window,
                },
            }
            : lexical;

        return {
            retriever: {
                text_similarity_reranker: {
                    retriever: candidates,
                    field: this.rerankField,
                    inference_id: this.rerankInferenceId,
                    inference_text: query,
                    rank_window_size: window,
                },
            },
            size: window,
            _source: { excludes: [this.vectorField] },
        };
    }
}
