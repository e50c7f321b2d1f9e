import type { DocumentNode } from "./ast";

export interface MarkdownPlugin {
    name?: string;
    onParseBlock?(doc: DocumentNode): void;
    onParseInline?(doc: DocumentNode): void;
    onTransform?(doc: DocumentNode): void;
    onRender?(html: string, doc: DocumentNode): string;
}

export interface PluginEntry {
    plugin: MarkdownPlugin;
    priority?: number;
}

export type PluginInput = MarkdownPlugin | PluginEntry;

function isPluginEntry(input: PluginInput): input is PluginEntry {
    return "plugin" in input && typeof input.plugin === "object" && input.plugin !== null;
}

export function toPluginEntry(input: PluginInput): PluginEntry {
    return isPluginEntry(input) ? input : { plugin: input };
}

/**
 * Plugins run in ascending priority; equal priorities keep the order they were
 * passed in (Array.prototype.sort is stable).
 */
export function orderPlugins(inputs: readonly PluginInput[]): MarkdownPlugin[] {
    return inputs
        .map(toPluginEntry)
        .sort((a, b) => (a.priority || 0) - (b.priority || 0))
        .map((entry) => entry.plugin);
}

export function pluginName(plugin: MarkdownPlugin): string {
    return plugin.name || "anonymous";
}
