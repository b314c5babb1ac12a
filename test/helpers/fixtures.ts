/**
 * @fileoverview Shared fixtures: temporary project roots, a recording
 * Output, a fixed clock, a scripted prompter and a fake tagger.
 *
 * @module test/helpers/fixtures
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { Clock } from '../../src/types/base.js';
import type { Category, ChangeEntry, PendingDocument, RemovalCandidate } from '../../src/types/changelog.js';
import { createContext } from '../../src/commands/context.js';
import type { CommandContext } from '../../src/commands/context.js';
import { createEmptyDocument, recount } from '../../src/core/changelog/pending.js';
import type { Output } from '../../src/ui/output.js';
import type { RemovalChoice, RemovalPrompter } from '../../src/ui/prompts.js';
import type { Tagger, TagOutcome } from '../../src/vcs/git.js';

// ============================================================
// Temporary Roots
// ============================================================

const created: string[] = [];

/**
 * Creates an empty directory named `name` inside a fresh temp directory,
 * so the default project name is predictable.
 */
export function makeRoot(name: string = 'demo'): string {
    const parent = fs.mkdtempSync(path.join(os.tmpdir(), 'changekeep-'));
    created.push(parent);
    const root = path.join(parent, name);
    fs.mkdirSync(root);
    return root;
}

/**
 * Removes every directory made by makeRoot.
 */
export function cleanupRoots(): void {
    for (const dir of created.splice(0)) {
        fs.rmSync(dir, { recursive: true, force: true });
    }
}

// ============================================================
// Clock
// ============================================================

/** 2024-01-15 10:30:00.123 local time */
export const FIXED_DATE = new Date(2024, 0, 15, 10, 30, 0, 123);

export const fixedClock: Clock = () => new Date(FIXED_DATE.getTime());

/**
 * Clock that advances one millisecond per call.
 */
export function tickingClock(start: Date = FIXED_DATE): Clock {
    let current = start.getTime();
    return () => new Date(current++);
}

// ============================================================
// Output
// ============================================================

export interface RecordedLine {
    readonly kind: 'print' | 'success' | 'info' | 'warn' | 'error';
    readonly text: string;
}

export interface RecordingOutput extends Output {
    readonly lines: RecordedLine[];
    textOf(kind: RecordedLine['kind']): string[];
}

export function recordingOutput(): RecordingOutput {
    const lines: RecordedLine[] = [];
    return {
        lines,
        print: (text) => { lines.push({ kind: 'print', text }); },
        success: (text) => { lines.push({ kind: 'success', text }); },
        info: (text) => { lines.push({ kind: 'info', text }); },
        warn: (text) => { lines.push({ kind: 'warn', text }); },
        error: (text) => { lines.push({ kind: 'error', text }); },
        textOf: (kind) => lines.filter(l => l.kind === kind).map(l => l.text),
    };
}

// ============================================================
// Prompter
// ============================================================

export interface ScriptedAnswers {
    readonly confirm?: boolean;
    readonly action?: RemovalChoice;
    readonly positions?: string;
}

export interface ScriptedPrompter extends RemovalPrompter {
    /** Candidate counts seen by each question */
    readonly asked: string[];
}

export function scriptedPrompter(answers: ScriptedAnswers = {}): ScriptedPrompter {
    const asked: string[] = [];
    return {
        asked,
        confirmRemoval: async (candidate: RemovalCandidate) => {
            asked.push(`confirm:${candidate.entry.description}`);
            return answers.confirm ?? false;
        },
        chooseAction: async (candidates) => {
            asked.push(`action:${candidates.length}`);
            return answers.action ?? 'abort';
        },
        pickPositions: async (candidates) => {
            asked.push(`pick:${candidates.length}`);
            return answers.positions ?? '';
        },
    };
}

// ============================================================
// Tagger
// ============================================================

export interface FakeTagger {
    readonly tagger: Tagger;
    readonly calls: Array<{ cwd: string; tag: string; message: string }>;
}

export function fakeTagger(outcome: 'created' | 'failed' = 'created'): FakeTagger {
    const calls: FakeTagger['calls'] = [];
    const tagger: Tagger = (cwd, tag, message): TagOutcome => {
        calls.push({ cwd, tag, message });
        return outcome === 'created'
            ? { status: 'created', tag }
            : { status: 'failed', tag, message: 'git not found' };
    };
    return { tagger, calls };
}

// ============================================================
// Context and Documents
// ============================================================

export interface TestContext extends CommandContext {
    readonly output: RecordingOutput;
}

export function testContext(
    root: string,
    overrides: { now?: Clock; tagger?: Tagger; prompter?: RemovalPrompter } = {}
): TestContext {
    const output = recordingOutput();
    const context = createContext(root, {
        output,
        now: overrides.now ?? tickingClock(),
        tagger: overrides.tagger ?? fakeTagger().tagger,
        prompter: overrides.prompter ?? scriptedPrompter(),
    });
    return { ...context, output };
}

export function entry(description: string, author: string | null = null, id: string = `chg_${description}`): ChangeEntry {
    return { id, description, timestamp: FIXED_DATE.toISOString(), author, status: 'pending' };
}

/**
 * Builds a document from category -> descriptions.
 */
export function documentWith(changes: Partial<Record<Category, readonly ChangeEntry[]>>): PendingDocument {
    const base = createEmptyDocument('demo', FIXED_DATE);
    return recount({ ...base, changes: { ...base.changes, ...changes } });
}

export function readJson(file: string): unknown {
    return JSON.parse(fs.readFileSync(file, 'utf-8'));
}
