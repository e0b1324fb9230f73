import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

@Injectable()
export class ElasticService {
    private readonly headers: Record<string, string>;
    private readonly esUrl: string;
    constructor(private readonly configService: ConfigService) {
        this.esUrl = (this.configService.get<string>('ELASTIC_URL') || '').replace(/\/+$/, '');
        const esPass = this.configService.get<string>('ELASTIC_API_KEY') || '';
        this.headers = {
            'Content-Type': 'application/json',
            'Authorization': `APIKey ${esPass}`
        }

    }

    isConfigured(): boolean {
        return this.esUrl.length > 0;
    }

    async elasticPost<T>(path: string, body: unknown): Promise<T> {
        const resp = await fetch(`${this.esUrl}${path}`, {
            method: "POST",
            headers: this.headers,
            body: JSON.stringify(body)
        });
        if (!resp.ok) {
            const text = await resp.text();
            throw new Error(`Elasticsearch error ${resp.status}: ${text}`);
        }
        return resp.json() as Promise<T>;
    }

    /** HEAD /<index>: true on 200, false on 404, throws on anything else. */
    async indexExists(index: string): Promise<boolean> {
        const resp = await fetch(`${this.esUrl}/${encodeURIComponent(index)}`, {
            method: "HEAD",
            headers: this.headers
        });
        if (resp.status === 404) return false;
        if (!resp.ok) {
            throw new Error(`Elasticsearch index check error ${resp.status}`);
        }
        return true;
    }
}
