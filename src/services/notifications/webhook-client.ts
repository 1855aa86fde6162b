import { DependencyUnavailableError, errorMessage } from '../../utils/errors';

export interface WebhookSender {
    postJson(url: string, body: unknown): Promise<void>;
}

export class WebhookClient implements WebhookSender {
    constructor(private readonly timeoutMs: number) {}

    async postJson(url: string, body: unknown): Promise<void> {
        const controller = new AbortController();
        const timer = setTimeout(() => controller.abort(), this.timeoutMs);

        let response: Response;
        try {
            response = await fetch(url, {
                method: 'POST',
                headers: { 'Content-Type': 'application/json' },
                body: JSON.stringify(body),
                signal: controller.signal,
            });
        } catch (error) {
            const reason = controller.signal.aborted ? `timed out after ${this.timeoutMs}ms` : errorMessage(error);
            throw new DependencyUnavailableError(`Webhook ${url} unreachable: ${reason}`);
        } finally {
            clearTimeout(timer);
        }

        if (!response.ok) {
            throw new DependencyUnavailableError(`Webhook ${url} responded ${response.status}`, {
                status: response.status,
            });
        }
    }
}
