import { Injectable } from '@nestjs/common';
import { readFile } from 'node:fs/promises';
import { PDFParse } from 'pdf-parse';
import mammoth from 'mammoth';
import { normalizeText } from '../../utils/textNormalizer';

/** Format-specific text extraction. Every reader may throw on a malformed file. */
@Injectable()
export class DocumentReaders {
    async readPdf(filePath: string): Promise<string> {
        const buf = await readFile(filePath);
        const parser = new PDFParse({ data: new Uint8Array(buf) });
        try {
            const result = await parser.getText();
            return normalizeText(result.text || '');
        } finally {
            await parser.destroy();
        }
    }

    async readWordProcessor(filePath: string): Promise<string> {
        const res = await mammoth.extractRawText({ path: filePath });
        return normalizeText(res.value || '');
    }

    async readPlain(filePath: string): Promise<string> {
        const raw = await readFile(filePath, 'utf8');
        return normalizeText(raw);
    }
}
