import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import fs from 'node:fs';
import os from 'node:os';
import path from 'path';
import { Readable } from 'node:stream';
import { FileUploadService } from './file-upload.service';

function multerFile(originalname: string, content: string): Express.Multer.File {
    const buffer = Buffer.from(content);
    return {
        fieldname: 'files',
        originalname,
        encoding: '7bit',
        mimetype: 'text/plain',
        size: buffer.length,
        buffer,
        stream: Readable.from(buffer),
        destination: '',
        filename: '',
        path: '',
    };
}

describe('FileUploadService', () => {
    let service: FileUploadService;
    let root: string;

    beforeEach(async () => {
        root = fs.mkdtempSync(path.join(os.tmpdir(), 'uploads-'));
        const module: TestingModule = await Test.createTestingModule({
            providers: [
                FileUploadService,
                { provide: ConfigService, useValue: new ConfigService({ UPLOADS_DIR: root }) },
            ],
        }).compile();

        service = module.get<FileUploadService>(FileUploadService);
    });

    afterEach(() => {
        fs.rmSync(root, { recursive: true, force: true });
    });

    it('writes each upload under the conversation directory with a fresh name', () => {
        const [a, b] = service.saveFileUploads([multerFile('Contrato.PDF', 'uno'), multerFile('nota.txt', 'dos')], 'c1');

        expect(path.dirname(a.localPath)).toBe(path.join(root, 'c1'));
        expect(a.localPath.endsWith('.pdf')).toBe(true);
        expect(a.originalName).toBe('Contrato.PDF');
        expect(fs.readFileSync(b.localPath, 'utf8')).toBe('dos');
        expect(a.localPath).not.toBe(b.localPath);
    });

    it('removes the conversation directory', () => {
        const stored = service.saveFileUpload(multerFile('nota.txt', 'x'), 'c2');

        service.removeConversationFiles('c2');
        service.removeConversationFiles('missing');

        expect(fs.existsSync(stored.localPath)).toBe(false);
        expect(fs.existsSync(path.join(root, 'c2'))).toBe(false);
    });

    it('rejects ids that escape the uploads directory', () => {
        expect(() => service.saveFileUpload(multerFile('a.txt', 'x'), '../fuera')).toThrow(
            'Invalid conversation id for uploads: ../fuera',
        );
    });
});
