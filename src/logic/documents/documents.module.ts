import { Module } from '@nestjs/common';
import { OcrModule } from '../ocr/ocr.module';
import { DocumentExtractorService } from './document-extractor.service';
import { DocumentReaders } from './document-readers';

@Module({
    imports: [OcrModule],
    providers: [DocumentReaders, DocumentExtractorService],
    exports: [DocumentExtractorService],
})
export class DocumentsModule {}
