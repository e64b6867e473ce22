export function sqlString(value: string): string {
    return `'${value.replace(/'/g, "''")}'`;
}

export function sqlNumber(value: number): string {
    if (!Number.isFinite(value)) {
        throw new RangeError(`Cannot embed non-finite number ${value} in SQL.`);
    }
    return String(value);
}

export function sqlStringList(values: readonly string[]): string {
    return values.map(sqlString).join(', ');
}

/** `date(expr, '+N days')`, or `date(expr)` when the offset is zero. */
export function dateShift(expression: string, days: number): string {
    if (days === 0) {
        return `date(${expression})`;
    }
    const sign = days > 0 ? '+' : '-';
    return `date(${expression}, '${sign}${Math.abs(Math.trunc(days))} days')`;
}

export function indent(text: string, depth: number = 1): string {
    const pad = '    '.repeat(depth);
    return text.split('\n').map((line) => (line.length > 0 ? pad + line : line)).join('\n');
}

export function renderCte(name: string, body: string): string {
    return `${name} AS (\n${indent(body)}\n)`;
}

export function renderWith(ctes: ReadonlyArray<{ name: string; body: string }>, select: string): string {
    if (ctes.length === 0) {
        return select;
    }
    return `WITH\n${ctes.map((cte) => renderCte(cte.name, cte.body)).join(',\n')}\n${select}`;
}

export function fragmentName(predicateId: string): string {
    return `p_${predicateId}`;
}

export function anchorName(anchor: string): string {
    return `anchor_${anchor}`;
}
