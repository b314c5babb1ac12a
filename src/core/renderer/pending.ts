/**
 * @fileoverview Dispatch for the three pending-changes output modes.
 *
 * @module core/renderer/pending
 */

import type { PendingDocument, PendingFormat } from '../../types/changelog.js';
import type { SettingsConfig } from '../../types/config.js';
import { renderPendingMarkdown } from './markdown.js';
import { renderPendingPretty } from './pretty.js';

/**
 * Renders the pending document in the requested mode. `structured` is the
 * document as indented JSON, after load-time normalization: unknown keys
 * dropped and the counter recomputed.
 */
export function renderPending(
    document: PendingDocument,
    format: PendingFormat,
    settings: Pick<SettingsConfig, 'date_format' | 'time_format'>
): string {
    switch (format) {
        case 'structured':
            return JSON.stringify(document, null, 2);
        case 'markdown':
            return renderPendingMarkdown(document);
        case 'pretty':
            return renderPendingPretty(document, settings);
    }
}
