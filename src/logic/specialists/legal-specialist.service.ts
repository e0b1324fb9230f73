import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ElasticService } from '../elastic/elastic.service';
import { GeminiService } from '../gemini/gemini.service';
import { RetrievalService } from '../retrieval/retrieval.service';
import { DomainSpecialist } from './domain-specialist';

@Injectable()
export class LegalSpecialistService extends DomainSpecialist {
    constructor(
        geminiService: GeminiService,
        retrievalService: RetrievalService,
        elasticService: ElasticService,
        configService: ConfigService,
    ) {
        super(
            { domain: 'legal', indexKey: 'ELASTIC_INDEX_LEGAL', specialty: 'legal', knowledgeBase: 'legales' },
            geminiService,
            retrievalService,
            elasticService,
            configService,
        );
    }
}
