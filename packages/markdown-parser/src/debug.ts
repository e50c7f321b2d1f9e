// packages/markdown-parser/src/debug.ts
import type { DocumentNode } from "./ast";

export interface DebugSnapshot {
    stage: string;
    ast: DocumentNode;
    logs: string[];
}

export interface DebugState {
    enabled: boolean;
    logs: string[];
    snapshots: DebugSnapshot[];
}

export function createDebugState(enabled = false): DebugState {
    return { enabled, logs: [], snapshots: [] };
}

export function isDebugMode(state: DebugState): boolean {
    return state.enabled;
}

export function logDebug(state: DebugState, message: string) {
    if (!state.enabled) return;
    state.logs.push(message);
}

export function getDebugSnapshots(state: DebugState): DebugSnapshot[] {
    return state.snapshots;
}

function cloneAst(doc: DocumentNode): DocumentNode {
    return structuredClone(doc);
}

/**
 * Records a copy of the tree and drains the pending log lines into it.
 * Does nothing unless debug mode is on.
 */
export function captureSnapshot(state: DebugState, stage: string, doc: DocumentNode) {
    if (!state.enabled) return;
    state.snapshots.push({
        stage,
        ast: cloneAst(doc),
        logs: [...state.logs],
    });
    state.logs = [];
}
