import request from 'supertest';
import { Express } from 'express';
import { createApp } from '../../src/api/app';
import { config } from '../../src/config';
import { SqliteDatabase } from '../../src/db/client';
import { IdempotencyGuard } from '../../src/services/coordination/redis-coordinator';
import { createServices, Services } from '../../src/services/container';
import { DependencyUnavailableError } from '../../src/utils/errors';
import { KeywordEmbedder, RecordingWebhook, testDatabase, testSalon } from '../helpers/fakes';

const API_KEY = 'test-admin-key';
const NOW = new Date('2025-03-03T15:30:00.000Z');

class MemoryIdempotencyGuard implements IdempotencyGuard {
    private seen = new Set<string>();

    async markResolutionProcessed(key: string): Promise<boolean> {
        if (this.seen.has(key)) return false;
        this.seen.add(key);
        return true;
    }

    async releaseResolution(key: string): Promise<void> {
        this.seen.delete(key);
    }
}

describe('HTTP API', () => {
    let db: SqliteDatabase;
    let services: Services;
    let app: Express;

    beforeEach(async () => {
        db = testDatabase();
        services = createServices(config, db, testSalon(), {
            embedder: new KeywordEmbedder(),
            webhook: new RecordingWebhook(),
            idempotency: new MemoryIdempotencyGuard(),
            now: () => NOW,
        });
        await services.knowledgeBase.loadFaq();
        app = createApp(services, { apiKey: API_KEY });
    });

    afterEach(async () => {
        jest.restoreAllMocks();
        await services.dispatcher.stop();
        db.close();
    });

    function callTool(sessionId: string, tool: string, body: Record<string, unknown> = {}) {
        return request(app)
            .post(`/api/sessions/${sessionId}/tools/${tool}`)
            .set('x-api-key', API_KEY)
            .send(body);
    }

    test('health check is public', async () => {
        const res = await request(app).get('/health');

        expect(res.status).toBe(200);
        expect(res.body.status).toBe('healthy');
        expect(res.body.notifications).toEqual({ pending: 0, delivered: 0, failed: 0 });
    });

    test('rejects requests without the admin key', async () => {
        const res = await request(app).get('/api/tools');

        expect(res.status).toBe(401);
        expect(res.body).toEqual({ status: 'error', code: 'unauthorized', message: 'Unauthorized' });
    });

    test('accepts a bearer token', async () => {
        const res = await request(app).get('/api/tools').set('Authorization', `Bearer ${API_KEY}`);

        expect(res.status).toBe(200);
        expect(res.body.tools.map((t: { name: string }) => t.name)).toEqual([
            'get_current_date_and_time',
            'update_booking_context',
            'get_booking_summary',
            'book_appointment',
            'check_availability',
            'cancel_appointment',
            'request_help',
        ]);
    });

    test('books an appointment through the tool endpoint', async () => {
        await callTool('call-1', 'update_booking_context', {
            roomName: 'room-1',
            customerName: 'Jane Doe',
            phoneNumber: '555-123-4567',
            service: 'Haircut',
            appointmentDate: 'March 3, 2025',
            appointmentTime: '2 PM',
        });

        const summary = await callTool('call-1', 'get_booking_summary');
        expect(summary.body.conversationState).toBe('ready_for_confirmation');
        expect(summary.body.waitingForConfirmation).toBe(true);

        const booked = await callTool('call-1', 'book_appointment');
        expect(booked.status).toBe(200);
        expect(booked.body.conversationState).toBe('completed');
        expect(booked.body.waitingForConfirmation).toBe(false);

        const listed = await request(app)
            .get('/api/appointments')
            .query({ date: '2025-03-03' })
            .set('x-api-key', API_KEY);
        expect(listed.body.date).toBe('March 3, 2025');
        expect(listed.body.count).toBe(1);
        expect(listed.body.appointments[0]).toMatchObject({
            customerName: 'Jane Doe',
            phoneNumber: '5551234567',
            service: 'Haircut',
            price: 40,
            appointmentTime: '2:00 PM',
            status: 'confirmed',
        });

        const availability = await request(app)
            .get('/api/appointments/availability')
            .query({ date: 'March 3, 2025' })
            .set('x-api-key', API_KEY);
        expect(availability.body).toEqual({
            date: 'March 3, 2025',
            capacityPerSlot: 2,
            available: ['9:00 AM', '10:00 AM', '11:00 AM', '1:00 PM', '2:00 PM', '3:00 PM', '4:00 PM'],
        });
    });

    test('ends sessions', async () => {
        await callTool('call-1', 'get_current_date_and_time');

        const first = await request(app).delete('/api/sessions/call-1').set('x-api-key', API_KEY);
        expect(first.status).toBe(204);

        const second = await request(app).delete('/api/sessions/call-1').set('x-api-key', API_KEY);
        expect(second.status).toBe(404);
    });

    test('cancels appointments and reports missing ones', async () => {
        const record = await services.ledger.reserve({
            customerName: 'Jane Doe',
            phoneNumber: '5551234567',
            service: 'Haircut',
            price: 40,
            appointmentDate: 'March 3, 2025',
            appointmentTime: '9:00 AM',
        });

        const cancelled = await request(app)
            .post(`/api/appointments/${record.confirmationNumber}/cancel`)
            .set('x-api-key', API_KEY)
            .send({ reason: 'caller request' });
        expect(cancelled.status).toBe(200);
        expect(cancelled.body.status).toBe('cancelled');
        expect(cancelled.body.cancellationReason).toBe('caller request');

        const again = await request(app)
            .post(`/api/appointments/${record.confirmationNumber}/cancel`)
            .set('x-api-key', API_KEY)
            .send({});
        expect(again.status).toBe(409);

        const missing = await request(app).get('/api/appointments/SA1').set('x-api-key', API_KEY);
        expect(missing.status).toBe(404);
        expect(missing.body.code).toBe('not_found');
    });

    test('rejects unrecognized dates', async () => {
        const res = await request(app)
            .get('/api/appointments')
            .query({ date: 'someday' })
            .set('x-api-key', API_KEY);

        expect(res.status).toBe(422);
        expect(res.body).toEqual({ status: 'error', code: 'validation_error', message: 'Unrecognized date: someday' });
    });

    test('a supervisor answer is learned and reused for a paraphrase', async () => {
        const escalated = await callTool('call-1', 'request_help', { roomName: 'room-1', question: 'Do you accept crypto?' });
        expect(escalated.body.result).toContain('Let me check with my supervisor');

        const pending = await request(app).get('/api/help-requests').set('x-api-key', API_KEY);
        expect(pending.body.count).toBe(1);
        const requestId: string = pending.body.requests[0].id;

        const fetched = await request(app).get(`/api/help-requests/${requestId}`).set('x-api-key', API_KEY);
        expect(fetched.body.question).toBe('Do you accept crypto?');
        expect(fetched.body.status).toBe('pending');

        const resolved = await request(app)
            .post(`/api/help-requests/${requestId}/resolve`)
            .set('x-api-key', API_KEY)
            .set('Idempotency-Key', 'resolve-1')
            .send({ answer: 'No, we only accept cash and cards.', kb_category: 'payments' });
        expect(resolved.status).toBe(200);
        expect(resolved.body).toEqual({
            event: 'help_request_resolved',
            request_id: requestId,
            room_name: 'room-1',
            original_question: 'Do you accept crypto?',
            answer: 'No, we only accept cash and cards.',
            response_time_seconds: 0,
            added_to_knowledge_base: true,
        });

        const replay = await request(app)
            .post(`/api/help-requests/${requestId}/resolve`)
            .set('x-api-key', API_KEY)
            .set('Idempotency-Key', 'resolve-1')
            .send({ answer: 'No, we only accept cash and cards.' });
        expect(replay.status).toBe(409);
        expect(replay.body.message).toBe('Duplicate resolution request');

        const second = await request(app)
            .post(`/api/help-requests/${requestId}/resolve`)
            .set('x-api-key', API_KEY)
            .send({ answer: 'Actually, yes.' });
        expect(second.status).toBe(409);
        expect(second.body.code).toBe('conflict');

        const answered = await callTool('call-2', 'request_help', { question: 'Can I pay with bitcoin?' });
        expect(answered.body.result).toBe('No, we only accept cash and cards.');

        const stillPending = await request(app).get('/api/help-requests').set('x-api-key', API_KEY);
        expect(stillPending.body.count).toBe(0);

        const all = await request(app).get('/api/help-requests').query({ status: 'all' }).set('x-api-key', API_KEY);
        expect(all.body.count).toBe(1);
        expect(all.body.requests[0].status).toBe('resolved');
    });

    test('a failed resolution can be retried with the same idempotency key', async () => {
        const requestId = await services.escalation.create('Do you accept crypto?', 'room-1');
        jest.spyOn(services.escalation, 'resolve')
            .mockRejectedValueOnce(new DependencyUnavailableError('help request store unavailable'));

        const first = await request(app)
            .post(`/api/help-requests/${requestId}/resolve`)
            .set('x-api-key', API_KEY)
            .set('Idempotency-Key', 'k1')
            .send({ answer: 'No, we only accept cash and cards.' });
        expect(first.status).toBe(503);
        expect(first.body.code).toBe('dependency_unavailable');

        const retry = await request(app)
            .post(`/api/help-requests/${requestId}/resolve`)
            .set('x-api-key', API_KEY)
            .set('Idempotency-Key', 'k1')
            .send({ answer: 'No, we only accept cash and cards.' });
        expect(retry.status).toBe(200);
        expect((await services.escalation.getById(requestId)).status).toBe('resolved');
    });

    test('idempotency keys are scoped to one help request', async () => {
        const firstId = await services.escalation.create('Do you accept crypto?', 'room-1');
        const secondId = await services.escalation.create('Do you sell gift vouchers?', 'room-2');

        for (const id of [firstId, secondId]) {
            const res = await request(app)
                .post(`/api/help-requests/${id}/resolve`)
                .set('x-api-key', API_KEY)
                .set('Idempotency-Key', 'shared-key')
                .send({ answer: 'Yes.', add_to_knowledge_base: false });
            expect(res.status).toBe(200);
        }
    });

    test('resolving requires an answer', async () => {
        const res = await request(app)
            .post('/api/help-requests/some-id/resolve')
            .set('x-api-key', API_KEY)
            .send({ answer: '   ' });

        expect(res.status).toBe(422);
        expect(res.body).toEqual({ status: 'error', code: 'validation_error', message: 'answer: answer is required' });
    });

    test('unknown help requests are 404', async () => {
        const res = await request(app).get('/api/help-requests/missing').set('x-api-key', API_KEY);

        expect(res.status).toBe(404);
    });

    test('reports and resyncs the knowledge collection', async () => {
        const before = await request(app).get('/api/knowledge').set('x-api-key', API_KEY);
        expect(before.body.collection).toBe(config.knowledge.collection);
        expect(before.body.faqCount).toBe(5);
        expect(before.body.itemCount).toBe(5);

        const sync = await request(app).post('/api/knowledge/sync').set('x-api-key', API_KEY);
        expect(sync.body).toEqual({ synced: 5 });

        const after = await request(app).get('/api/knowledge').set('x-api-key', API_KEY);
        expect(after.body.itemCount).toBe(5);
    });
});
