import { SqliteDatabase } from '../../../src/db/client';
import { HelpRequestRepository } from '../../../src/db/repositories/help-request-repository';
import { SqliteVectorIndex } from '../../../src/db/repositories/knowledge-item-repository';
import { OutboxRepository } from '../../../src/db/repositories/outbox-repository';
import { HelpRequestStatus } from '../../../src/models/help-request';
import { EscalationManager, KnowledgeSink, NotificationTargets } from '../../../src/services/escalation/escalation-manager';
import { KnowledgeBase } from '../../../src/services/knowledge/knowledge-base';
import { NotificationOutbox } from '../../../src/services/notifications/outbox';
import { ConflictError, CorruptRecordError, NotFoundError } from '../../../src/utils/errors';
import { KeywordEmbedder, testDatabase } from '../../helpers/fakes';

const CREATED_AT = new Date('2025-03-03T15:00:00.000Z');

describe('EscalationManager', () => {
    let db: SqliteDatabase;
    let outboxRepo: OutboxRepository;
    let knowledgeBase: KnowledgeBase;
    let clock: Date;

    function manager(targets: NotificationTargets = {}, knowledge: KnowledgeSink = knowledgeBase): EscalationManager {
        return new EscalationManager({
            store: new HelpRequestRepository(db),
            knowledge,
            outbox: new NotificationOutbox(outboxRepo),
            targets,
            now: () => clock,
        });
    }

    beforeEach(() => {
        db = testDatabase();
        outboxRepo = new OutboxRepository(db);
        knowledgeBase = new KnowledgeBase({
            index: new SqliteVectorIndex(db, 'knowledge_base'),
            embedder: new KeywordEmbedder(),
            faqFilePath: 'unused.json',
            similarityThreshold: 0.8,
            topK: 3,
        });
        clock = CREATED_AT;
    });

    afterEach(() => {
        db.close();
    });

    test('crypto question round trip: escalate, resolve, then answer from the knowledge base', async () => {
        const escalation = manager();
        const id = await escalation.create('Do you accept crypto?', 'room-42');

        const pending = await escalation.getById(id);
        expect(pending.status).toBe(HelpRequestStatus.PENDING);
        expect(pending.answer).toBeNull();
        expect(pending.responseTimeSeconds).toBeNull();

        clock = new Date(CREATED_AT.getTime() + 90_000);
        const result = await escalation.resolve(id, {
            answer: 'Yes, via X',
            addToKnowledgeBase: true,
            kbCategory: 'payments',
        });

        expect(result).toEqual({
            event: 'help_request_resolved',
            request_id: id,
            room_name: 'room-42',
            original_question: 'Do you accept crypto?',
            answer: 'Yes, via X',
            response_time_seconds: 90,
            added_to_knowledge_base: true,
        });

        const resolved = await escalation.getById(id);
        expect(resolved).toMatchObject({
            status: HelpRequestStatus.RESOLVED,
            answer: 'Yes, via X',
            responseTimeSeconds: 90,
            resolvedBy: 'supervisor',
            resolvedAt: '2025-03-03T15:01:30.000Z',
        });

        const match = await knowledgeBase.searchSemantic('crypto payment');
        expect(match?.answer).toBe('Yes, via X');
    });

    test('resolving without knowledge base ingestion leaves the index alone', async () => {
        const escalation = manager();
        const id = await escalation.create('Do you accept crypto?', null);
        const result = await escalation.resolve(id, { answer: 'No', addToKnowledgeBase: false, kbCategory: 'general' });

        expect(result.added_to_knowledge_base).toBe(false);
        expect(result.response_time_seconds).toBe(0);
        expect(await knowledgeBase.itemCount()).toBe(0);
    });

    test('a failed ingestion still resolves the request', async () => {
        const failing: KnowledgeSink = {
            addLearnedItem: async () => { throw new Error('vector service down'); },
        };
        const escalation = manager({}, failing);
        const id = await escalation.create('Do you do beard trims?', null);

        const result = await escalation.resolve(id, { answer: 'Yes', addToKnowledgeBase: true, kbCategory: 'services' });

        expect(result.added_to_knowledge_base).toBe(false);
        expect((await escalation.getById(id)).status).toBe(HelpRequestStatus.RESOLVED);
    });

    test('unknown ids are not_found', async () => {
        await expect(manager().resolve('missing', { answer: 'x', addToKnowledgeBase: false, kbCategory: 'general' }))
            .rejects.toBeInstanceOf(NotFoundError);
        await expect(manager().getById('missing')).rejects.toBeInstanceOf(NotFoundError);
    });

    test('unreadable stored documents are corrupt_record', async () => {
        db.prepare(`
            INSERT INTO help_requests (id, question, status, created_at, updated_at)
            VALUES ('broken', 'Parking?', 'pending', 'not a date', 'not a date')
        `).run();
        db.prepare(`
            INSERT INTO help_requests (id, question, status, created_at, updated_at, customer_context)
            VALUES ('bad-context', 'Parking?', 'pending', '2025-03-03T15:00:00.000Z', '2025-03-03T15:00:00.000Z', '{oops')
        `).run();

        const escalation = manager();
        await expect(escalation.resolve('broken', { answer: 'x', addToKnowledgeBase: false, kbCategory: 'general' }))
            .rejects.toBeInstanceOf(CorruptRecordError);
        await expect(escalation.getById('bad-context')).rejects.toBeInstanceOf(CorruptRecordError);
    });

    test('a second resolution of the same request is rejected', async () => {
        const escalation = manager();
        const id = await escalation.create('Do you accept crypto?', null);
        await escalation.resolve(id, { answer: 'Yes', addToKnowledgeBase: false, kbCategory: 'general' });

        await expect(escalation.resolve(id, { answer: 'No', addToKnowledgeBase: false, kbCategory: 'general' }))
            .rejects.toBeInstanceOf(ConflictError);
        expect((await escalation.getById(id)).answer).toBe('Yes');
    });

    test('queues notifications after each state change', async () => {
        const escalation = manager({
            supervisorWebhookUrl: 'http://supervisor.test/hook',
            aiCallbackUrl: 'http://runtime.test/callback',
            supervisorPhone: '+15550001111',
        });

        const id = await escalation.create('Do you accept crypto?', 'room-42');
        const created = outboxRepo.findDue(CREATED_AT.toISOString(), 10);
        expect(created.map(e => [e.kind, e.channel, e.target])).toEqual([
            ['help_request_created', 'webhook', 'http://supervisor.test/hook'],
            ['help_request_created', 'sms', '+15550001111'],
        ]);
        expect(JSON.parse(created[0].payload)).toEqual({
            event: 'help_request_created',
            request_id: id,
            question: 'Do you accept crypto?',
            room_name: 'room-42',
            created_at: '2025-03-03T15:00:00.000Z',
        });

        await escalation.resolve(id, { answer: 'Yes, via X', addToKnowledgeBase: false, kbCategory: 'general' });
        const all = outboxRepo.findDue(CREATED_AT.toISOString(), 10);
        expect(all).toHaveLength(3);
        expect(all[2].target).toBe('http://runtime.test/callback');
        expect(JSON.parse(all[2].payload)).toEqual({
            event: 'help_request_resolved',
            request_id: id,
            room_name: 'room-42',
            original_question: 'Do you accept crypto?',
            answer: 'Yes, via X',
        });
    });

    test('a broken outbox never blocks request creation', async () => {
        db.exec('DROP TABLE notification_outbox');
        const escalation = manager({ supervisorWebhookUrl: 'http://supervisor.test/hook' });

        const id = await escalation.create('Do you accept crypto?', null);
        expect((await escalation.getById(id)).status).toBe(HelpRequestStatus.PENDING);
    });

    test('lists pending requests newest first', async () => {
        const escalation = manager();
        const first = await escalation.create('First question', null);
        clock = new Date(CREATED_AT.getTime() + 1000);
        const second = await escalation.create('Second question', null);
        clock = new Date(CREATED_AT.getTime() + 2000);
        const third = await escalation.create('Third question', null);
        await escalation.resolve(second, { answer: 'done', addToKnowledgeBase: false, kbCategory: 'general' });

        expect((await escalation.listPending()).map(r => r.id)).toEqual([third, first]);
        expect((await escalation.listRecent()).map(r => r.id)).toEqual([third, second, first]);
    });
});
