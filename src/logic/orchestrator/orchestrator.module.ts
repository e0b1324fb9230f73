import { Module } from '@nestjs/common';
import { AssistantGraphModule } from '../assistant-graph/assistant-graph.module';
import { OrchestratorService } from './orchestrator.service';

@Module({
    imports: [AssistantGraphModule],
    providers: [OrchestratorService],
    exports: [OrchestratorService],
})
export class OrchestratorModule {}
