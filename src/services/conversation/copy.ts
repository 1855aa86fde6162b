import type { ServiceOffering } from '../../models/salon-config';

/**
 * Every sentence the receptionist hands back to the conversational runtime.
 * Internal error text never reaches a caller; failures map to one of these.
 */
export const copy = {
    currentDateTime: (humanReadable: string) => `The current date and time is ${humanReadable}`,

    // Field collection
    fieldsUpdated: (fields: string[], missing: string[]) =>
        missing.length === 0
            ? `Great! I've updated: ${fields.join(', ')}. I now have all your information. Let me summarize everything for you.`
            : `I've updated: ${fields.join(', ')}. I still need: ${missing.join(', ')}.`,
    nothingToUpdate: (missing: string[]) =>
        missing.length === 0
            ? 'I already have all your information. Let me summarize everything for you.'
            : `I still need: ${missing.join(', ')}.`,
    emptyName: 'I didn\'t catch your name. Could you tell me again?',
    invalidPhone: (input: string) =>
        `"${input}" doesn't look right. Phone number must be exactly 10 digits. Please provide a valid 10-digit phone number.`,
    unknownService: (input: string, services: readonly ServiceOffering[]) =>
        `'${input}' is not available. Our services are: ${services.map(s => s.displayName).join(', ')}`,
    invalidDate: (input: string) =>
        `I couldn't understand the date "${input}". Could you say it like "March 3, 2025"?`,
    closedDay: (closed: string[], open: string[]) =>
        `We're closed on ${closed.map(d => `${d}s`).join(' and ')}. Please choose another day (we're open ${open.join(', ')}).`,
    outsideHours: (time: string, slots: readonly string[]) =>
        `${time} is outside our business hours. Our appointment times are: ${slots.join(', ')}`,
    invalidTime: (input: string, slots: readonly string[]) =>
        `I couldn't understand the time "${input}". Our appointment times are: ${slots.join(', ')}`,

    // Summary and confirmation
    incomplete: (missing: string[]) => `Booking is incomplete. Still need: ${missing.join(', ')}`,
    summary: (lines: { name: string; phone: string; service: string; price: string; date: string; time: string }) =>
        'Here\'s what I have:\n'
        + `Name: ${lines.name}\n`
        + `Phone: ${lines.phone}\n`
        + `Service: ${lines.service} (${lines.price})\n`
        + `Date: ${lines.date}\n`
        + `Time: ${lines.time}\n\n`
        + 'Does everything look correct?',
    cannotBookIncomplete: 'Cannot book - missing required information. Please provide all details first.',
    summarizeFirst: 'Please let me summarize the booking details for confirmation first.',
    bookingConfirmed: (service: string, date: string, time: string, confirmationNumber: string) =>
        `Perfect! Your appointment is confirmed for ${service} on ${date} at ${time}. `
        + `Your confirmation number is ${confirmationNumber}. We'll see you then!`,
    slotTaken: (time: string, date: string, alternatives: readonly string[]) =>
        alternatives.length > 0
            ? `I'm sorry, ${time} on ${date} is fully booked. Available slots on ${date}: ${alternatives.join(', ')}`
            : `I'm sorry, all slots on ${date} are fully booked. Would you like to check another date?`,
    bookingFailed:
        'I apologize, but I\'m having trouble completing your booking right now. '
        + 'Let me get assistance from my supervisor to help you with this.',

    // Availability
    slotAvailable: (time: string, date: string) => `${time} on ${date} is available.`,
    slotFull: (time: string, date: string, alternatives: readonly string[]) =>
        alternatives.length > 0
            ? `${time} is fully booked. Available slots on ${date}: ${alternatives.join(', ')}`
            : `All slots on ${date} are fully booked.`,
    availableTimes: (date: string, slots: readonly string[]) =>
        slots.length > 0
            ? `Available times on ${date}:\n${slots.map(s => `• ${s}`).join('\n')}`
            : `Unfortunately, we're fully booked on ${date}. Would you like to check another date?`,
    availabilityFailed: 'I\'m having trouble checking availability. Let me get help from my supervisor.',

    // Cancellation
    cancelled: (confirmationNumber: string, date: string, time: string) =>
        `Your appointment ${confirmationNumber} on ${date} at ${time} has been cancelled.`,
    cancelNotFound: (confirmationNumber: string) =>
        `I couldn't find an appointment with confirmation number ${confirmationNumber}. Could you check the number?`,
    alreadyCancelled: (confirmationNumber: string) =>
        `Appointment ${confirmationNumber} was already cancelled.`,
    cancelFailed: 'I\'m having trouble cancelling that appointment. Let me get help from my supervisor.',

    // Questions and escalation
    emptyQuestion: 'Could you tell me what you\'d like to know?',
    escalated:
        'Let me check with my supervisor about that and get back to you. '
        + 'I\'ve noted your question. Please hold for a moment while I get the correct information.',
    technicalIssue:
        'I\'m having a technical issue right now. Please hold on or I can connect you with a supervisor.',

    invalidArguments: (tool: string) => `I couldn't use ${tool} with that information. Could you rephrase it?`,
    unknownTool: (tool: string) => `Unknown tool: ${tool}`,
};
