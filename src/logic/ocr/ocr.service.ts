import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ImageAnnotatorClient } from '@google-cloud/vision';
import { readFile } from 'node:fs/promises';
import sharp from 'sharp';
import { errorMessage } from '../../utils/errors';

const BINARIZE_THRESHOLD = 128;

@Injectable()
export class OcrService {
    private readonly logger = new Logger(OcrService.name);
    private readonly client: ImageAnnotatorClient | null;

    constructor(private readonly configService: ConfigService) {
        const keyFilename = this.configService.get<string>('GOOGLE_VISION_KEY_PATH');
        this.client = keyFilename ? new ImageAnnotatorClient({ keyFilename }) : null;
        if (!this.client) {
            this.logger.warn('GOOGLE_VISION_KEY_PATH not set, image text extraction is disabled');
        }
    }

    /**
     * Reads the text of an image. The binarized image goes first; when that
     * yields nothing (or binarization fails) the original image is sent.
     */
    async readImage(filePath: string): Promise<string> {
        if (!this.client) return '';

        const binarized = await this.binarize(filePath);
        if (binarized) {
            const text = await this.recognize(binarized);
            if (text.trim()) return text;
        }

        return this.recognize(await readFile(filePath));
    }

    async binarize(filePath: string): Promise<Buffer | null> {
        try {
            return await sharp(filePath)
                .grayscale()
                .normalise()
                .threshold(BINARIZE_THRESHOLD)
                .png()
                .toBuffer();
        } catch (error) {
            this.logger.warn(`Binarization failed for ${filePath}: ${errorMessage(error)}`);
            return null;
        }
    }

    private async recognize(image: Buffer): Promise<string> {
        if (!this.client) return '';
        const [response] = await this.client.batchAnnotateImages({
            requests: [{ image: { content: image }, features: [{ type: 'DOCUMENT_TEXT_DETECTION' }] }],
        });
        return response.responses?.[0]?.fullTextAnnotation?.text ?? '';
    }
}
