import type { SqliteDatabase } from '../client';
import { AppointmentRecord, AppointmentStatus, NewAppointment } from '../../models/appointment';

interface AppointmentRow {
    id: number;
    confirmation_number: string;
    customer_name: string;
    phone_number: string;
    service: string;
    price: number;
    appointment_date: string;
    appointment_time: string;
    status: AppointmentStatus;
    cancelled: number;
    cancellation_reason: string | null;
    created_at: string;
    updated_at: string;
}

function toRecord(row: AppointmentRow): AppointmentRecord {
    return {
        id: row.id,
        confirmationNumber: row.confirmation_number,
        customerName: row.customer_name,
        phoneNumber: row.phone_number,
        service: row.service,
        price: row.price,
        appointmentDate: row.appointment_date,
        appointmentTime: row.appointment_time,
        status: row.status,
        cancelled: row.cancelled === 1,
        cancellationReason: row.cancellation_reason,
        createdAt: row.created_at,
        updatedAt: row.updated_at,
    };
}

/**
 * Persistence seam for the slot ledger. Methods are async because the ledger
 * treats the document store as a remote, long-latency dependency.
 */
export interface AppointmentStore {
    countActive(date: string, time: string): Promise<number>;
    countActiveByTime(date: string): Promise<Map<string, number>>;
    /** Inserts only while the pair holds fewer than `capacity` active records. */
    insertIfBelowCapacity(appt: NewAppointment, capacity: number): Promise<AppointmentRecord | null>;
    findByConfirmation(confirmationNumber: string): Promise<AppointmentRecord | null>;
    findByDate(date: string): Promise<AppointmentRecord[]>;
    markCancelled(confirmationNumber: string, reason: string | null, now: string): Promise<AppointmentRecord | null>;
}

export class AppointmentRepository implements AppointmentStore {
    constructor(private readonly db: SqliteDatabase) {}

    private countSync(date: string, time: string): number {
        const row = this.db.prepare(`
            SELECT COUNT(*) AS total FROM appointments
            WHERE appointment_date = ? AND appointment_time = ? AND cancelled = 0
        `).get(date, time) as { total: number };
        return row.total;
    }

    async countActive(date: string, time: string): Promise<number> {
        return this.countSync(date, time);
    }

    async countActiveByTime(date: string): Promise<Map<string, number>> {
        const rows = this.db.prepare(`
            SELECT appointment_time AS time, COUNT(*) AS total FROM appointments
            WHERE appointment_date = ? AND cancelled = 0
            GROUP BY appointment_time
        `).all(date) as { time: string; total: number }[];
        return new Map(rows.map(r => [r.time, r.total]));
    }

    async insertIfBelowCapacity(appt: NewAppointment, capacity: number): Promise<AppointmentRecord | null> {
        const insert = this.db.prepare(`
            INSERT INTO appointments (
                confirmation_number, customer_name, phone_number, service, price,
                appointment_date, appointment_time, status, cancelled, created_at, updated_at
            ) VALUES (?, ?, ?, ?, ?, ?, ?, 'confirmed', 0, ?, ?)
        `);

        // IMMEDIATE takes the write lock before counting, so the count and the
        // insert cannot interleave with another writer.
        const reserve = this.db.transaction((): number | null => {
            if (this.countSync(appt.appointmentDate, appt.appointmentTime) >= capacity) {
                return null;
            }
            const result = insert.run(
                appt.confirmationNumber,
                appt.customerName,
                appt.phoneNumber,
                appt.service,
                appt.price,
                appt.appointmentDate,
                appt.appointmentTime,
                appt.createdAt,
                appt.updatedAt
            );
            return Number(result.lastInsertRowid);
        });

        const id = reserve.immediate();
        if (id === null) return null;

        const row = this.db.prepare('SELECT * FROM appointments WHERE id = ?').get(id) as AppointmentRow;
        return toRecord(row);
    }

    async findByConfirmation(confirmationNumber: string): Promise<AppointmentRecord | null> {
        const row = this.db.prepare('SELECT * FROM appointments WHERE confirmation_number = ?')
            .get(confirmationNumber) as AppointmentRow | undefined;
        return row ? toRecord(row) : null;
    }

    async findByDate(date: string): Promise<AppointmentRecord[]> {
        const rows = this.db.prepare(`
            SELECT * FROM appointments WHERE appointment_date = ? ORDER BY created_at DESC
        `).all(date) as AppointmentRow[];
        return rows.map(toRecord);
    }

    async markCancelled(confirmationNumber: string, reason: string | null, now: string): Promise<AppointmentRecord | null> {
        const result = this.db.prepare(`
            UPDATE appointments
            SET status = 'cancelled', cancelled = 1, cancellation_reason = ?, updated_at = ?
            WHERE confirmation_number = ? AND cancelled = 0
        `).run(reason, now, confirmationNumber);

        if (result.changes === 0) return null;
        return this.findByConfirmation(confirmationNumber);
    }
}
