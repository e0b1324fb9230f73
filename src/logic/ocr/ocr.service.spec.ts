import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { OcrService } from './ocr.service';

const mockBatchAnnotate = jest.fn();
const mockToBuffer = jest.fn();

jest.mock('@google-cloud/vision', () => ({
    ImageAnnotatorClient: jest.fn().mockImplementation(() => ({
        batchAnnotateImages: (...args: unknown[]) => mockBatchAnnotate(...args),
    })),
}));

jest.mock('sharp', () => {
    const pipeline: Record<string, () => unknown> = {
        grayscale: () => pipeline,
        normalise: () => pipeline,
        threshold: () => pipeline,
        png: () => pipeline,
        toBuffer: () => mockToBuffer(),
    };
    return { __esModule: true, default: jest.fn(() => pipeline) };
});

jest.mock('node:fs/promises', () => ({
    readFile: jest.fn().mockResolvedValue(Buffer.from('original')),
}));

function annotated(text: string) {
    return [{ responses: [{ fullTextAnnotation: { text } }] }];
}

function request(content: Buffer) {
    return { requests: [{ image: { content }, features: [{ type: 'DOCUMENT_TEXT_DETECTION' }] }] };
}

async function createService(keyPath: string): Promise<OcrService> {
    const module: TestingModule = await Test.createTestingModule({
        providers: [
            OcrService,
            { provide: ConfigService, useValue: new ConfigService({ GOOGLE_VISION_KEY_PATH: keyPath }) },
        ],
    }).compile();
    return module.get<OcrService>(OcrService);
}

describe('OcrService', () => {
    const binarized = Buffer.from('binarized');

    beforeEach(() => {
        mockBatchAnnotate.mockReset();
        mockToBuffer.mockReset().mockResolvedValue(binarized);
    });

    it('returns the text read from the binarized image', async () => {
        mockBatchAnnotate.mockResolvedValue(annotated('Total: 1.000 €'));
        const service = await createService('/keys/vision.json');

        await expect(service.readImage('/tmp/factura.png')).resolves.toBe('Total: 1.000 €');
        expect(mockBatchAnnotate).toHaveBeenCalledTimes(1);
        expect(mockBatchAnnotate).toHaveBeenCalledWith(request(binarized));
    });

    it('falls back to the original image when the binarized pass is empty', async () => {
        mockBatchAnnotate
            .mockResolvedValueOnce(annotated('  '))
            .mockResolvedValueOnce(annotated('Firma'));
        const service = await createService('/keys/vision.json');

        await expect(service.readImage('/tmp/contrato.jpg')).resolves.toBe('Firma');
        expect(mockBatchAnnotate).toHaveBeenLastCalledWith(request(Buffer.from('original')));
    });

    it('falls back to the original image when binarization fails', async () => {
        mockToBuffer.mockRejectedValue(new Error('unsupported image'));
        mockBatchAnnotate.mockResolvedValue([{ responses: [{ fullTextAnnotation: null }] }]);
        const service = await createService('/keys/vision.json');

        await expect(service.readImage('/tmp/roto.png')).resolves.toBe('');
        expect(mockBatchAnnotate).toHaveBeenCalledTimes(1);
    });

    it('reads nothing without Vision credentials', async () => {
        const service = await createService('');
        await expect(service.readImage('/tmp/a.png')).resolves.toBe('');
        expect(mockBatchAnnotate).not.toHaveBeenCalled();
    });
});
