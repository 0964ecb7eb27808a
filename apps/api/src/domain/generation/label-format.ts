/**
 * Renders labels as a bracketed list of single-quoted names, e.g. `['Cat', 'Animal']`.
 * Earlier deployments fed the model exactly this shape, so it stays byte-stable.
 */
export function formatLabelList(labels: readonly string[]): string {
    const quoted = labels.map(label => `'${label.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`);
    return `[${quoted.join(', ')}]`;
}

export function buildGenerationPrompt(promptTemplate: string, labels: readonly string[]): string {
    return `${promptTemplate} \n ${formatLabelList(labels)}`;
}
