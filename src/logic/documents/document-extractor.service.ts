import { Injectable, Logger } from '@nestjs/common';
import { OcrService } from '../ocr/ocr.service';
import { DocumentReaders } from './document-readers';
import { MAX_DOC_CHARS, truncateDoc } from '../../utils/docMemory';
import { fileExtension } from '../../utils/textNormalizer';
import { errorMessage } from '../../utils/errors';

type Reader = (filePath: string) => Promise<string>;

@Injectable()
export class DocumentExtractorService {
    private readonly logger = new Logger(DocumentExtractorService.name);
    private readonly readers: Map<string, Reader>;

    constructor(
        documentReaders: DocumentReaders,
        ocrService: OcrService,
    ) {
        const pdf: Reader = p => documentReaders.readPdf(p);
        const word: Reader = p => documentReaders.readWordProcessor(p);
        const plain: Reader = p => documentReaders.readPlain(p);
        const image: Reader = p => ocrService.readImage(p);
        this.readers = new Map<string, Reader>([
            ['pdf', pdf],
            ['docx', word],
            ['doc', word],
            ['txt', plain],
            ['md', plain],
            ['jpg', image],
            ['jpeg', image],
            ['png', image],
        ]);
    }

    /**
     * Appends the text of newly uploaded files to the remembered document text.
     * Without new files the previous text passes through untouched.
     */
    async extract(filePaths: readonly string[], previousText: string): Promise<string> {
        if (filePaths.length === 0) {
            return previousText;
        }

        this.logger.log(`Processing ${filePaths.length} new file(s)`);
        const texts: string[] = [];
        for (const filePath of filePaths) {
            const text = await this.extractFile(filePath);
            if (text) texts.push(text);
        }
        const textDump = texts.join('\n');

        const combined = truncateDoc(`${previousText}\n${textDump}`.trim(), MAX_DOC_CHARS);
        this.logger.log(`Extracted chars: ${combined.length}`);
        return combined;
    }

    private async extractFile(filePath: string): Promise<string> {
        const ext = fileExtension(filePath);
        const reader = this.readers.get(ext);
        if (!reader) {
            this.logger.warn(`Unsupported extension: ${ext || '(none)'} (${filePath})`);
            return '';
        }
        try {
            return await reader(filePath);
        } catch (error) {
            this.logger.error(`Error processing ${filePath}: ${errorMessage(error)}`);
            return '';
        }
    }
}
