// Domain
import { type ArchivedNewsItem } from '../../../domain/entities/archived-news-item.entity.js';

// Ports
import { type NewsArchivePort } from '../../ports/outbound/persistence/news-archive.port.js';

/**
 * Use case for inspecting the archive, most recently seen first
 */
export class DumpArchiveUseCase {
    constructor(private readonly newsArchive: NewsArchivePort) {}

    public async execute(limit?: number): Promise<ArchivedNewsItem[]> {
        return this.newsArchive.listAll(limit);
    }
}
