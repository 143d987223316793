/**
 * Operation-scoped header layouts
 *
 * Reads each worksheet's header row at most once per operation.
 */

import { buildHeaderLayout, type HeaderLayout } from '@shipsync/shared/domain';
import type { SheetSourceProfile } from '../../config/sync/sheets.js';
import { resolveSheetRows } from './eligibility.js';
import type { SheetDocument } from './types.js';

export class HeaderCache {
    private readonly layouts = new Map<string, HeaderLayout>();

    constructor(
        private readonly document: SheetDocument,
        private readonly profile: SheetSourceProfile
    ) {}

    rowsFor(title: string): { headerRow: number; dataStartRow: number } {
        return resolveSheetRows(title, this.profile);
    }

    async layout(title: string): Promise<HeaderLayout> {
        const cached = this.layouts.get(title);
        if (cached) return cached;

        const headerRow = await this.document.worksheet(title).readRow(this.rowsFor(title).headerRow);
        const layout = buildHeaderLayout(headerRow);
        this.layouts.set(title, layout);
        return layout;
    }
}
