export interface ToolDefinition {
    name: string;
    description: string;
    input_schema: {
        type: 'object';
        properties: Record<string, { type: string; description: string }>;
        required?: string[];
    };
}

export const TOOLS: ToolDefinition[] = [
    {
        name: 'get_current_date_and_time',
        description: 'Get the current date and time in the salon\'s timezone. Use this before resolving relative dates like "tomorrow" or "next Monday".',
        input_schema: {
            type: 'object',
            properties: {}
        }
    },
    {
        name: 'update_booking_context',
        description: 'Store booking details as the customer provides them. Send only the fields the customer just gave; earlier fields are kept.',
        input_schema: {
            type: 'object',
            properties: {
                customerName: { type: 'string', description: 'Customer\'s full name' },
                phoneNumber: { type: 'string', description: '10-digit phone number, any formatting' },
                service: { type: 'string', description: 'Requested service, e.g. "Haircut"' },
                appointmentDate: { type: 'string', description: 'Date, e.g. "March 3, 2025"' },
                appointmentTime: { type: 'string', description: 'Time, e.g. "10:00 AM"' }
            }
        }
    },
    {
        name: 'get_booking_summary',
        description: 'Read back everything collected so far. Call this before asking the customer to confirm.',
        input_schema: {
            type: 'object',
            properties: {}
        }
    },
    {
        name: 'book_appointment',
        description: 'Book the appointment from the stored booking details. NEVER call this until the customer has explicitly confirmed the summary.',
        input_schema: {
            type: 'object',
            properties: {}
        }
    },
    {
        name: 'check_availability',
        description: 'Check open slots for a date, or whether one specific time on that date is free.',
        input_schema: {
            type: 'object',
            properties: {
                date: { type: 'string', description: 'Date to check, e.g. "January 15, 2025"' },
                time: { type: 'string', description: 'Optional time to check, e.g. "2:00 PM"' }
            },
            required: ['date']
        }
    },
    {
        name: 'cancel_appointment',
        description: 'Cancel an existing appointment by its confirmation number.',
        input_schema: {
            type: 'object',
            properties: {
                confirmationNumber: { type: 'string', description: 'Confirmation number, e.g. "SA1740000000000123"' },
                reason: { type: 'string', description: 'Optional reason given by the customer' }
            },
            required: ['confirmationNumber']
        }
    },
    {
        name: 'request_help',
        description: 'Answer a customer question from the salon FAQ and knowledge base, or pass it to a human supervisor when no answer is known.',
        input_schema: {
            type: 'object',
            properties: {
                question: { type: 'string', description: 'The customer\'s question' }
            },
            required: ['question']
        }
    }
];
