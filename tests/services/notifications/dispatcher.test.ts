import { SqliteDatabase } from '../../../src/db/client';
import { OutboxRepository } from '../../../src/db/repositories/outbox-repository';
import { computeBackoff, OutboxDispatcher } from '../../../src/services/notifications/dispatcher';
import { NotificationOutbox } from '../../../src/services/notifications/outbox';
import { WebhookSender } from '../../../src/services/notifications/webhook-client';
import { RecordingSms, RecordingWebhook, testDatabase } from '../../helpers/fakes';

const START = new Date('2025-03-03T15:00:00.000Z');

describe('OutboxDispatcher', () => {
    let db: SqliteDatabase;
    let repo: OutboxRepository;
    let outbox: NotificationOutbox;
    let webhook: RecordingWebhook;
    let sms: RecordingSms;
    let clock: Date;

    function dispatcher(withSms = true): OutboxDispatcher {
        return new OutboxDispatcher(repo, { webhook, sms: withSms ? sms : undefined }, {
            maxAttempts: 3,
            backoffMs: 1000,
            pollIntervalMs: 60_000,
            now: () => clock,
        });
    }

    beforeEach(() => {
        db = testDatabase();
        repo = new OutboxRepository(db);
        outbox = new NotificationOutbox(repo);
        webhook = new RecordingWebhook();
        sms = new RecordingSms();
        clock = START;
    });

    afterEach(() => {
        db.close();
    });

    test('delivers queued webhooks and SMS alerts', async () => {
        const hookId = outbox.enqueue({
            kind: 'help_request_created',
            channel: 'webhook',
            target: 'http://supervisor.test/hook',
            payload: { event: 'help_request_created', request_id: 'r-1' },
        }, START);
        outbox.enqueue({
            kind: 'help_request_created',
            channel: 'sms',
            target: '+15550001111',
            payload: { message: 'New help request r-1' },
        }, START);

        const summary = await dispatcher().drain();

        expect(summary).toEqual({ delivered: 2, retried: 0, failed: 0 });
        expect(webhook.calls).toEqual([
            { url: 'http://supervisor.test/hook', body: { event: 'help_request_created', request_id: 'r-1' } },
        ]);
        expect(sms.messages).toEqual([{ to: '+15550001111', body: 'New help request r-1' }]);
        expect(repo.findById(hookId)).toMatchObject({ status: 'delivered', attempts: 1, lastError: null });
        expect(outbox.stats()).toEqual({ pending: 0, delivered: 2, failed: 0 });
    });

    test('retries with exponential backoff and gives up after the last attempt', async () => {
        webhook.failuresLeft = 10;
        const id = outbox.enqueue({
            kind: 'help_request_resolved',
            channel: 'webhook',
            target: 'http://runtime.test/callback',
            payload: { event: 'help_request_resolved' },
        }, START);
        const worker = dispatcher();

        expect(await worker.drain()).toEqual({ delivered: 0, retried: 1, failed: 0 });
        expect(repo.findById(id)).toMatchObject({
            status: 'pending',
            attempts: 1,
            nextAttemptAt: '2025-03-03T15:00:01.000Z',
            lastError: 'Webhook http://runtime.test/callback responded 502',
        });

        // Not due yet
        expect(await worker.drain()).toEqual({ delivered: 0, retried: 0, failed: 0 });

        clock = new Date('2025-03-03T15:00:01.000Z');
        expect(await worker.drain()).toEqual({ delivered: 0, retried: 1, failed: 0 });
        expect(repo.findById(id)?.nextAttemptAt).toBe('2025-03-03T15:00:03.000Z');

        clock = new Date('2025-03-03T15:00:03.000Z');
        expect(await worker.drain()).toEqual({ delivered: 0, retried: 0, failed: 1 });
        expect(repo.findById(id)).toMatchObject({ status: 'failed', attempts: 3 });
        expect(webhook.calls).toHaveLength(3);
    });

    test('a transient failure is delivered on the next attempt', async () => {
        webhook.failuresLeft = 1;
        const id = outbox.enqueue({
            kind: 'help_request_created',
            channel: 'webhook',
            target: 'http://supervisor.test/hook',
            payload: {},
        }, START);
        const worker = dispatcher();

        await worker.drain();
        clock = new Date('2025-03-03T15:00:05.000Z');
        await worker.drain();

        expect(repo.findById(id)).toMatchObject({ status: 'delivered', attempts: 2 });
    });

    test('SMS intents fail when no SMS sender is configured', async () => {
        const id = outbox.enqueue({
            kind: 'help_request_created',
            channel: 'sms',
            target: '+15550001111',
            payload: { message: 'hello' },
        }, START);

        await dispatcher(false).drain();
        expect(repo.findById(id)).toMatchObject({ attempts: 1, lastError: 'SMS channel is not configured' });
    });

    test('overlapping drains share one pass', async () => {
        outbox.enqueue({ kind: 'help_request_created', channel: 'webhook', target: 'http://supervisor.test/hook', payload: {} }, START);
        const worker = dispatcher();

        const [a, b] = await Promise.all([worker.drain(), worker.drain()]);
        expect(a).toBe(b);
        await worker.stop();
        expect(webhook.calls).toHaveLength(1);
    });

    test('stopping skips the follow-up pass of an overlapping drain', async () => {
        let release: () => void = () => undefined;
        const gate = new Promise<void>((resolve) => { release = resolve; });
        const posted: string[] = [];
        const slowWebhook: WebhookSender = {
            postJson: async (url) => {
                posted.push(url);
                await gate;
            },
        };
        const worker = new OutboxDispatcher(repo, { webhook: slowWebhook }, {
            maxAttempts: 3,
            backoffMs: 1000,
            pollIntervalMs: 60_000,
            now: () => clock,
        });

        outbox.enqueue({ kind: 'help_request_created', channel: 'webhook', target: 'http://supervisor.test/first', payload: {} }, START);
        const pass = worker.drain();
        const laterId = outbox.enqueue({ kind: 'help_request_created', channel: 'webhook', target: 'http://supervisor.test/second', payload: {} }, START);
        const overlapping = worker.drain();

        const stopping = worker.stop();
        release();
        await stopping;
        await Promise.all([pass, overlapping]);
        await new Promise((resolve) => setImmediate(resolve));

        expect(posted).toEqual(['http://supervisor.test/first']);
        expect(repo.findById(laterId)).toMatchObject({ status: 'pending', attempts: 0 });
    });

    test('backoff doubles per attempt up to the cap', () => {
        expect(computeBackoff(1, 1000, 60_000)).toBe(1000);
        expect(computeBackoff(2, 1000, 60_000)).toBe(2000);
        expect(computeBackoff(4, 1000, 60_000)).toBe(8000);
        expect(computeBackoff(10, 1000, 60_000)).toBe(60_000);
    });
});
