import { z } from 'zod';

/**
 * Single outbound notification channel.
 * Rejects when the message could not be delivered.
 */
export interface Notifier {
    readonly name: string;
    send(message: string, title: string): Promise<void>;
}

/**
 * Pushover credentials file
 */
export const PushoverCredentialsSchema = z.object({
    /** Recipient user or group key */
    userKey: z.string().min(1),
    /** Application API token */
    apiToken: z.string().min(1),
    /** Optional device name to target */
    device: z.string().min(1).optional(),
});

export type PushoverCredentials = z.infer<typeof PushoverCredentialsSchema>;
