import twilio from 'twilio';
import { DependencyUnavailableError, errorMessage } from '../../utils/errors';

export interface SmsSender {
    send(to: string, body: string): Promise<void>;
}

export class TwilioSmsSender implements SmsSender {
    private client: twilio.Twilio;

    constructor(accountSid: string, authToken: string, private readonly fromNumber: string) {
        this.client = twilio(accountSid, authToken);
    }

    async send(to: string, body: string): Promise<void> {
        try {
            await this.client.messages.create({
                body,
                from: this.fromNumber,
                to,
            });
        } catch (error) {
            throw new DependencyUnavailableError(`SMS to ${to} failed: ${errorMessage(error)}`);
        }
    }
}
