import { type NewsItem } from '../../../../domain/entities/news-item.entity.js';

export interface NotificationReport {
    delivered: NewsItem[];
    undelivered: NewsItem[];
}

/**
 * News notifier port - announces newly archived articles to an external sink
 */
export interface NewsNotifierPort {
    /**
     * Best-effort delivery. Failures are reported through `undelivered`, never thrown.
     */
    notify(items: NewsItem[]): Promise<NotificationReport>;
}
