import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ElasticService } from '../elastic/elastic.service';
import { GeminiService } from '../gemini/gemini.service';
import { RetrievalService } from '../retrieval/retrieval.service';
import { DomainSpecialist } from './domain-specialist';

@Injectable()
export class FinancialSpecialistService extends DomainSpecialist {
    constructor(
        geminiService: GeminiService,
        retrievalService: RetrievalService,
        elasticService: ElasticService,
        configService: ConfigService,
    ) {
        super(
            { domain: 'financial', indexKey: 'ELASTIC_INDEX_FINANCIAL', specialty: 'financiero', knowledgeBase: 'financieros' },
            geminiService,
            retrievalService,
            elasticService,
            configService,
        );
    }
}
