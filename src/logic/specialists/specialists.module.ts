import { Module } from '@nestjs/common';
import { GeminiModule } from '../gemini/gemini.module';
import { RetrievalModule } from '../retrieval/retrieval.module';
import { FinancialSpecialistService } from './financial-specialist.service';
import { LegalSpecialistService } from './legal-specialist.service';

@Module({
    imports: [GeminiModule, RetrievalModule],
    providers: [LegalSpecialistService, FinancialSpecialistService],
    exports: [LegalSpecialistService, FinancialSpecialistService],
})
export class SpecialistsModule {}
