import { describe, expect, test } from 'vitest';
import { mock } from 'vitest-mock-extended';

// Domain
import { getMockNewsItem } from '../../../../domain/entities/__mocks__/news-items.mock.js';
import { ArchivedNewsItem } from '../../../../domain/entities/archived-news-item.entity.js';

// Ports
import { type NewsArchivePort } from '../../../ports/outbound/persistence/news-archive.port.js';

import { DumpArchiveUseCase } from '../dump-archive.use-case.js';

describe('DumpArchiveUseCase', () => {
    test('should list the archive with the requested limit', async () => {
        // Given - an archive holding one item
        const archived = [
            ArchivedNewsItem.from(getMockNewsItem(1), new Date('2024-06-01T10:00:00.000Z')),
        ];
        const mockNewsArchive = mock<NewsArchivePort>();
        mockNewsArchive.listAll.mockResolvedValue(archived);

        // When - dumping with a limit
        const result = await new DumpArchiveUseCase(mockNewsArchive).execute(5);

        // Then - the archive listing is returned as is
        expect(result).toBe(archived);
        expect(mockNewsArchive.listAll).toHaveBeenCalledWith(5);
    });
});
