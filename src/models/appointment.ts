export type AppointmentStatus = 'confirmed' | 'cancelled';

export interface AppointmentRecord {
    id?: number;
    confirmationNumber: string;
    customerName: string;
    phoneNumber: string;
    service: string;
    price: number;
    appointmentDate: string;
    appointmentTime: string;
    status: AppointmentStatus;
    cancelled: boolean;
    cancellationReason: string | null;
    createdAt: string;
    updatedAt: string;
}

export type NewAppointment = Omit<AppointmentRecord, 'id' | 'status' | 'cancelled' | 'cancellationReason'>;

/**
 * Issues `SA`-prefixed confirmation numbers from a microsecond-resolution clock.
 * Values are strictly increasing within the process, so two bookings in the same
 * millisecond still get distinct numbers.
 */
export class ConfirmationNumberGenerator {
    private last = 0;

    constructor(private readonly clock: () => number = () => Date.now()) {}

    next(): string {
        const micros = Number(process.hrtime.bigint() / 1000n % 1000n);
        let candidate = this.clock() * 1000 + micros;
        if (candidate <= this.last) {
            candidate = this.last + 1;
        }
        this.last = candidate;
        return `SA${candidate}`;
    }
}
