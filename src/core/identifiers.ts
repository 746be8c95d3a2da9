// ─────────────────────────────────────────────────────────────
// PyForm  ·  Identifier Normalizer
// Host symbol names → plain target identifiers
// ─────────────────────────────────────────────────────────────

import type { IdentifierCollision } from './diagnostics';
import { DEFAULT_TARGET, reservedNames, type TargetConfig } from './targets';

// \[Alpha], \[CapitalDelta], \[ScriptL] ...
const GLYPH_REGEX = /\\\[([A-Za-z0-9]+)\]/g;

export function normalizeIdentifier(rawName: string, target: TargetConfig = DEFAULT_TARGET): string {
    // Context-qualified names: Global`x → x
    const local = rawName.slice(rawName.lastIndexOf('`') + 1);

    let name = local
        .replace(GLYPH_REGEX, (_, glyph: string) => glyph.toLowerCase())
        .replace(/[^A-Za-z0-9_]/g, '');

    if (name === '') name = '_';
    if (/^[0-9]/.test(name)) name = '_' + name;
    if (reservedNames(target).includes(name)) name += '_';
    return name;
}

// ── Per-unit collision tracking ─────────────────────────────

/**
 * Remembers which raw names produced each identifier within one
 * translation unit, so that non-injective normalization is reported.
 */
export class IdentifierScope {
    private byIdentifier = new Map<string, string[]>();

    constructor(private readonly target: TargetConfig = DEFAULT_TARGET) {}

    resolve(rawName: string): string {
        const id = normalizeIdentifier(rawName, this.target);
        const raws = this.byIdentifier.get(id);
        if (!raws) this.byIdentifier.set(id, [rawName]);
        else if (!raws.includes(rawName)) raws.push(rawName);
        return id;
    }

    collisions(): IdentifierCollision[] {
        const out: IdentifierCollision[] = [];
        for (const [identifier, names] of this.byIdentifier) {
            if (names.length < 2) continue;
            out.push({
                kind: 'IdentifierCollision',
                severity: 'error',
                message: `Names ${names.join(', ')} all normalize to '${identifier}'`,
                identifier,
                names: [...names],
            });
        }
        return out;
    }
}
