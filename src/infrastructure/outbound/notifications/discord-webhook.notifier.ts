// Application
import {
    type NewsNotifierPort,
    type NotificationReport,
} from '../../../application/ports/outbound/notifications/news-notifier.port.js';

// Domain
import { type NewsItem } from '../../../domain/entities/news-item.entity.js';

import { type LoggerPort } from '../../../shared/logger/logger.port.js';

// Constants
export const MAX_EMBEDS_PER_REQUEST = 10;
export const MAX_DESCRIPTION_LENGTH = 2048;
const REQUEST_TIMEOUT_MS = 15_000;
const USER_AGENT = 'NewsArchiveMonitor/1.0';

// Types
export interface DiscordWebhookConfiguration {
    footer: string;
    username: string;
    webhookUrl: string;
}

export interface DiscordEmbed {
    description: string;
    footer: { text: string };
    timestamp?: string;
    title: string;
    url: string;
}

const chunk = <T>(items: T[], size: number): T[][] =>
    Array.from({ length: Math.ceil(items.length / size) }, (_, index) =>
        items.slice(index * size, (index + 1) * size),
    );

// Counts code points so a cut never splits a surrogate pair
const truncate = (text: string, maxLength: number): string => {
    const codePoints = Array.from(text);
    return codePoints.length > maxLength
        ? `${codePoints.slice(0, maxLength - 1).join('')}…`
        : text;
};

/**
 * Posts new articles to a Discord webhook as embeds, ten per message
 */
export class DiscordWebhookNotifier implements NewsNotifierPort {
    constructor(
        private readonly configuration: DiscordWebhookConfiguration,
        private readonly logger: LoggerPort,
    ) {}

    public buildEmbed(item: NewsItem): DiscordEmbed {
        const embed: DiscordEmbed = {
            description: truncate(item.summary ?? '', MAX_DESCRIPTION_LENGTH),
            footer: { text: this.configuration.footer },
            title: item.title,
            url: item.link,
        };

        if (item.publishedAt) {
            embed.timestamp = item.publishedAt.toISOString();
        }

        return embed;
    }

    public async notify(items: NewsItem[]): Promise<NotificationReport> {
        const report: NotificationReport = { delivered: [], undelivered: [] };

        if (items.length === 0) {
            this.logger.info('No new items to send to Discord');
            return report;
        }

        for (const batch of chunk(items, MAX_EMBEDS_PER_REQUEST)) {
            try {
                await this.postBatch(batch);
                report.delivered.push(...batch);
                this.logger.info('Posted news items to Discord', { count: batch.length });
            } catch (error) {
                report.undelivered.push(...batch);
                this.logger.error('Failed to send news to Discord', {
                    error,
                    identities: batch.map((item) => item.identity),
                });
            }
        }

        return report;
    }

    private async postBatch(batch: NewsItem[]): Promise<void> {
        const response = await fetch(this.configuration.webhookUrl, {
            body: JSON.stringify({
                embeds: batch.map((item) => this.buildEmbed(item)),
                username: this.configuration.username,
            }),
            headers: {
                'Content-Type': 'application/json',
                'User-Agent': USER_AGENT,
            },
            method: 'POST',
            signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
        });

        if (!response.ok) {
            const body = await response.text();
            throw new Error(`Discord webhook responded with status ${response.status}: ${body}`);
        }
    }
}
