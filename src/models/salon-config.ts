import fs from 'fs';
import { z } from 'zod';

export const WEEKDAYS = ['monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday', 'sunday'] as const;

export type Weekday = typeof WEEKDAYS[number];

export interface ServiceOffering {
    key: string;
    displayName: string;
    price: number;
}

export interface SalonConfig {
    businessName: string;
    timezone: string;
    currency: string;
    closedWeekdays: Weekday[];
    slots: string[];
    maxBookingsPerSlot: number;
    services: ServiceOffering[];
}

const SLOT_PATTERN = /^(1[0-2]|[1-9]):[0-5]\d (AM|PM)$/;

const SalonConfigSchema = z.object({
    businessName: z.string().min(1, 'businessName is required'),
    timezone: z.string().min(1).default('UTC'),
    currency: z.string().default('$'),
    closedWeekdays: z.array(z.enum(WEEKDAYS)).default(['thursday']),
    slots: z.array(z.string().regex(SLOT_PATTERN, 'slots must look like "9:00 AM"')).min(1, 'at least one slot is required'),
    maxBookingsPerSlot: z.number().int().positive().default(2),
    services: z.record(z.string(), z.number().positive()),
});

export function titleCase(value: string): string {
    return value
        .split(/\s+/)
        .filter(Boolean)
        .map(word => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
        .join(' ');
}

export function validateSalonConfig(raw: unknown): SalonConfig {
    const parsed = SalonConfigSchema.safeParse(raw);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(i => `- ${i.path.join('.') || '(root)'}: ${i.message}`).join('\n');
        throw new Error(`Invalid salon configuration:\n${issues}`);
    }

    const data = parsed.data;

    try {
        Intl.DateTimeFormat(undefined, { timeZone: data.timezone });
    } catch (e) {
        throw new Error(`Invalid timezone: ${data.timezone}`);
    }

    if (new Set(data.slots).size !== data.slots.length) {
        throw new Error('Salon slots must be unique');
    }

    const services = Object.entries(data.services).map(([name, price]) => ({
        key: name.trim().toLowerCase(),
        displayName: titleCase(name),
        price,
    }));
    if (services.length === 0) {
        throw new Error('At least one service is required');
    }

    return {
        businessName: data.businessName,
        timezone: data.timezone,
        currency: data.currency,
        closedWeekdays: data.closedWeekdays,
        slots: data.slots,
        maxBookingsPerSlot: data.maxBookingsPerSlot,
        services,
    };
}

export function loadSalonConfig(filePath: string): SalonConfig {
    let raw: unknown;
    try {
        raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    } catch (error) {
        throw new Error(`Failed to read salon configuration at ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
    }
    return validateSalonConfig(raw);
}

export function findService(salon: SalonConfig, name: string): ServiceOffering | undefined {
    const key = name.trim().toLowerCase();
    return salon.services.find(s => s.key === key);
}
