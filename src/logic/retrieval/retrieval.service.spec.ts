import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { RetrievalService } from './retrieval.service';
import { ElasticService } from '../elastic/elastic.service';
import { GeminiService } from '../gemini/gemini.service';

jest.mock('@google/genai', () => ({ GoogleGenAI: jest.fn() }));

describe('RetrievalService', () => {
    let service: RetrievalService;
    const elastic = { elasticPost: jest.fn() };
    const gemini = { embedTexts: jest.fn() };

    const searchResponse = {
        hits: {
            hits: [
                { _id: 'a', _score: 0.9, _source: { content: 'Texto A' } },
                { _id: 'b', _score: 0.5, _source: { content: 'Texto B' } },
                { _id: 'c', _score: 0.1, _source: { content: 'Texto C' } },
            ],
        },
    };

    beforeEach(async () => {
        elastic.elasticPost.mockReset().mockResolvedValue(searchResponse);
        gemini.embedTexts.mockReset().mockResolvedValue([[0.1, 0.2, 0.3]]);

        const module: TestingModule = await Test.createTestingModule({
            providers: [
                RetrievalService,
                { provide: ElasticService, useValue: elastic },
                { provide: GeminiService, useValue: gemini },
                {
                    provide: ConfigService,
                    useValue: new ConfigService({
                        ELASTIC_TEXT_FIELDS: 'title^2,content',
                        ELASTIC_VECTOR_FIELD: 'vec',
                        ELASTIC_RERANK_INFERENCE_ID: 'rerank-test',
                        ELASTIC_RERANK_FIELD: 'content',
                        RAG_MIN_SCORE: 0.2,
                    }),
                },
            ],
        }).compile();

        service = module.get<RetrievalService>(RetrievalService);
    });

    it('drops hits scoring below the default threshold', async () => {
        const hits = await service.search('legal-idx', 'arrendamiento');
        expect(hits.map(h => h.id)).toEqual(['a', 'b']);
        expect(hits[0]).toEqual({ id: 'a', score: 0.9, fields: { content: 'Texto A' } });
    });

    it('lets the caller override threshold and result count', async () => {
        expect((await service.search('legal-idx', 'q', { minScore: 0 })).map(h => h.id)).toEqual(['a', 'b', 'c']);
        expect((await service.search('legal-idx', 'q', { minScore: 0, topK: 1 })).map(h => h.id)).toEqual(['a']);
    });

    it('returns nothing when the threshold is above every score', async () => {
        await expect(service.search('legal-idx', 'q', { minScore: 0.91 })).resolves.toEqual([]);
    });

    it('fuses lexical and vector retrievers under the semantic re-ranker', async () => {
        await service.search('legal-idx', 'arrendamiento', { topK: 3 });

        expect(elastic.elasticPost).toHaveBeenCalledWith('/legal-idx/_search', {
            retriever: {
                text_similarity_reranker: {
                    retriever: {
                        rrf: {
                            retrievers: [
                                {
                                    standard: {
                                        query: {
                                            multi_match: {
                                                query: 'arrendamiento',
                                                fields: ['title^2', 'content'],
                                                fuzziness: 'AUTO',
                                            },
                                        },
                                    },
                                },
                                {
                                    knn: {
                                        field: 'vec',
                                        query_vector: [0.1, 0.2, 0.3],
                                        k: 10,
                                        num_candidates: 100,
                                    },
                                },
                            ],
                            rank_window_size: 10,
                        },
                    },
                    field: 'content',
                    inference_id: 'rerank-test',
                    inference_text: 'arrendamiento',
                    rank_window_size: 10,
                },
            },
            size: 10,
            _source: { excludes: ['vec'] },
        });
    });

    it('searches without a vector when embedding fails', async () => {
        gemini.embedTexts.mockRejectedValue(new Error('embedding down'));

        const hits = await service.search('legal-idx', 'q');

        expect(hits).toHaveLength(2);
        const body = elastic.elasticPost.mock.calls[0][1];
        expect(body.retriever.text_similarity_reranker.retriever).toEqual({
            standard: { query: { multi_match: { query: 'q', fields: ['title^2', 'content'], fuzziness: 'AUTO' } } },
        });
    });

    it('treats an empty embedding as no vector', async () => {
        gemini.embedTexts.mockResolvedValue([]);
        await service.search('legal-idx', 'q');
        const body = elastic.elasticPost.mock.calls[0][1];
        expect(body.retriever.text_similarity_reranker.retriever.rrf).toBeUndefined();
    });

    it('propagates search-service failures', async () => {
        elastic.elasticPost.mockRejectedValue(new Error('Elasticsearch error 503: unavailable'));
        await expect(service.search('legal-idx', 'q')).rejects.toThrow('Elasticsearch error 503');
    });

    it('builds a context string from the kept hits', async () => {
        await expect(service.retrieve('legal-idx', 'q')).resolves.toBe('Texto A\nTexto B');
    });
});
