import { createDatabase, SqliteDatabase } from '../../src/db/client';
import { SalonConfig, validateSalonConfig } from '../../src/models/salon-config';
import { Embedder } from '../../src/services/knowledge/embedder';
import { WebhookSender } from '../../src/services/notifications/webhook-client';
import { SmsSender } from '../../src/services/notifications/sms-sender';
import { DependencyUnavailableError } from '../../src/utils/errors';

export const SALON_SLOTS = ['9:00 AM', '10:00 AM', '11:00 AM', '1:00 PM', '2:00 PM', '3:00 PM', '4:00 PM'];

export function testSalon(): SalonConfig {
    return validateSalonConfig({
        businessName: 'Test Salon',
        timezone: 'America/New_York',
        currency: '$',
        closedWeekdays: ['thursday'],
        slots: SALON_SLOTS,
        maxBookingsPerSlot: 2,
        services: {
            haircut: 40,
            'hair coloring': 80,
            highlights: 120,
        },
    });
}

export function testDatabase(): SqliteDatabase {
    return createDatabase(':memory:');
}

/**
 * Each dimension is a concept; a text scores 1 on a dimension for every token
 * that starts with one of the concept's stems. Paraphrases that share
 * concepts land close together.
 */
const CONCEPTS: string[][] = [
    ['crypto', 'bitcoin'],
    ['pay', 'accept', 'card', 'cash'],
    ['park', 'garage'],
    ['open', 'hour', 'close'],
    ['gift', 'voucher'],
    ['kid', 'child'],
    ['beard', 'shave'],
    ['wheelchair', 'accessib'],
];

export class KeywordEmbedder implements Embedder {
    public calls = 0;

    async dimension(): Promise<number> {
        return CONCEPTS.length;
    }

    async embed(text: string): Promise<number[]> {
        this.calls++;
        const tokens = text.toLowerCase().split(/[^a-z]+/).filter(Boolean);
        return CONCEPTS.map(stems => tokens.filter(token => stems.some(stem => token.startsWith(stem))).length);
    }

    async embedMany(texts: string[]): Promise<number[][]> {
        return Promise.all(texts.map(text => this.embed(text)));
    }
}

export class UnavailableEmbedder implements Embedder {
    async dimension(): Promise<number> {
        throw new DependencyUnavailableError('embedding service down');
    }

    async embed(): Promise<number[]> {
        throw new DependencyUnavailableError('embedding service down');
    }

    async embedMany(): Promise<number[][]> {
        throw new DependencyUnavailableError('embedding service down');
    }
}

export class RecordingWebhook implements WebhookSender {
    public calls: { url: string; body: unknown }[] = [];
    public failuresLeft = 0;

    async postJson(url: string, body: unknown): Promise<void> {
        this.calls.push({ url, body });
        if (this.failuresLeft > 0) {
            this.failuresLeft--;
            throw new DependencyUnavailableError(`Webhook ${url} responded 502`);
        }
    }
}

export class RecordingSms implements SmsSender {
    public messages: { to: string; body: string }[] = [];

    async send(to: string, body: string): Promise<void> {
        this.messages.push({ to, body });
    }
}
