import { mkdirSync, renameSync, rmSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';

// Application
import { type NewsMirrorPort } from '../../../../application/ports/outbound/persistence/news-mirror.port.js';

// Domain
import { type ArchivedNewsItem } from '../../../../domain/entities/archived-news-item.entity.js';

import { type LoggerPort } from '../../../../shared/logger/logger.port.js';

const LEDGER_ENCODING = 'utf-8';

/**
 * One ledger line. The raw payload stays in the database.
 */
export interface LedgerEntry {
    firstSeenAt: string;
    identity: string;
    link: string;
    publishedAt: null | string;
    summary: null | string;
    title: string;
}

export const toLedgerEntry = (item: ArchivedNewsItem): LedgerEntry => ({
    firstSeenAt: item.firstSeenAt.toISOString(),
    identity: item.identity,
    link: item.link,
    publishedAt: item.publishedAt?.toISOString() ?? null,
    summary: item.summary,
    title: item.title,
});

/**
 * Mirrors the archive into a JSON Lines file, one article per line.
 * The file is rewritten in full through a temporary sibling and a rename.
 */
export class JsonlNewsMirrorAdapter implements NewsMirrorPort {
    constructor(
        private readonly ledgerPath: string,
        private readonly logger: LoggerPort,
    ) {}

    async sync(snapshot: ArchivedNewsItem[]): Promise<void> {
        const temporaryPath = `${this.ledgerPath}.tmp`;
        const content = snapshot.map((item) => `${JSON.stringify(toLedgerEntry(item))}\n`).join('');

        mkdirSync(dirname(this.ledgerPath), { recursive: true });
        writeFileSync(temporaryPath, content, LEDGER_ENCODING);
        try {
            renameSync(temporaryPath, this.ledgerPath);
        } catch (error) {
            rmSync(temporaryPath, { force: true });
            throw error;
        }

        this.logger.debug('mirror:synced', {
            entryCount: snapshot.length,
            ledgerPath: this.ledgerPath,
        });
    }
}

/**
 * Mirror used when no ledger path is configured
 */
export class NoopNewsMirrorAdapter implements NewsMirrorPort {
    async sync(): Promise<void> {}
}
