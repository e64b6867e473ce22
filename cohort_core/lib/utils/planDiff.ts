/**
 * Line diff between two plan texts, in unified-diff notation with full context.
 * Plans are a few hundred lines at most, so a plain LCS table is enough.
 */

export interface PlanTextDiff {
    added: number;
    removed: number;
    text: string;
}

type DiffLine = { op: ' ' | '-' | '+'; line: string };

export function createPlanDiff(fromLabel: string, toLabel: string, original: string, modified: string): PlanTextDiff {
    const originalLines = original ? original.split('\n') : [];
    const modifiedLines = modified ? modified.split('\n') : [];
    const lines = diffLines(originalLines, modifiedLines);

    const removed = lines.filter((entry) => entry.op === '-').length;
    const added = lines.filter((entry) => entry.op === '+').length;

    const text = [
        `--- ${fromLabel}`,
        `+++ ${toLabel}`,
        `@@ -1,${originalLines.length} +1,${modifiedLines.length} @@`,
        ...lines.map((entry) => `${entry.op}${entry.line}`),
    ].join('\n');

    return { added, removed, text };
}

function diffLines(left: readonly string[], right: readonly string[]): DiffLine[] {
    const rows = left.length + 1;
    const cols = right.length + 1;
    const table = new Uint32Array(rows * cols);

    for (let i = left.length - 1; i >= 0; i -= 1) {
        for (let j = right.length - 1; j >= 0; j -= 1) {
            table[(i * cols) + j] = left[i] === right[j]
                ? table[((i + 1) * cols) + j + 1] + 1
                : Math.max(table[((i + 1) * cols) + j], table[(i * cols) + j + 1]);
        }
    }

    const output: DiffLine[] = [];
    let i = 0;
    let j = 0;
    while (i < left.length && j < right.length) {
        if (left[i] === right[j]) {
            output.push({ op: ' ', line: left[i] });
            i += 1;
            j += 1;
        } else if (table[((i + 1) * cols) + j] >= table[(i * cols) + j + 1]) {
            output.push({ op: '-', line: left[i] });
            i += 1;
        } else {
            output.push({ op: '+', line: right[j] });
            j += 1;
        }
    }
    while (i < left.length) {
        output.push({ op: '-', line: left[i] });
        i += 1;
    }
    while (j < right.length) {
        output.push({ op: '+', line: right[j] });
        j += 1;
    }
    return output;
}
