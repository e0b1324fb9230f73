import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import fs from 'node:fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';

export interface StoredUpload {
    localPath: string;
    originalName: string;
    size: number;
    mimeType: string;
}

/** Keeps uploads on local disk under <UPLOADS_DIR>/<conversationId>/ so later turns can reread them. */
@Injectable()
export class FileUploadService {
    private readonly logger = new Logger(FileUploadService.name);
    private readonly uploadsDir: string;

    constructor(private readonly configService: ConfigService) {
        this.uploadsDir = path.resolve(process.cwd(), this.configService.get<string>('UPLOADS_DIR') || 'uploads');
    }

    saveFileUpload(file: Express.Multer.File, conversationId: string): StoredUpload {
        const dir = this.conversationDir(conversationId);
        if (!fs.existsSync(dir)) {
            fs.mkdirSync(dir, { recursive: true });
        }

        // keep the extension, it picks the text reader
        const uniqueFilename = `${uuidv4()}${path.extname(file.originalname).toLowerCase()}`;
        const localPath = path.join(dir, uniqueFilename);
        fs.writeFileSync(localPath, file.buffer);
        this.logger.log(`Stored ${file.originalname} as ${localPath}`);

        return {
            localPath,
            originalName: file.originalname,
            size: file.size,
            mimeType: file.mimetype,
        };
    }

    saveFileUploads(files: Express.Multer.File[], conversationId: string): StoredUpload[] {
        return files.map(f => this.saveFileUpload(f, conversationId));
    }

    removeConversationFiles(conversationId: string): void {
        fs.rmSync(this.conversationDir(conversationId), { recursive: true, force: true });
    }

    private conversationDir(conversationId: string): string {
        const dir = path.resolve(this.uploadsDir, conversationId);
        if (path.dirname(dir) !== this.uploadsDir) {
            throw new Error(`Invalid conversation id for uploads: ${conversationId}`);
        }
        return dir;
    }
}
