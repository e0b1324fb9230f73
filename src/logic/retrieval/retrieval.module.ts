import { Module } from '@nestjs/common';
import { ElasticModule } from '../elastic/elastic.module';
import { GeminiModule } from '../gemini/gemini.module';
import { RetrievalService } from './retrieval.service';

@Module({
    imports: [ElasticModule, GeminiModule],
    providers: [RetrievalService],
    exports: [RetrievalService, ElasticModule],
})
export class RetrievalModule {}
