import { EffectiveSettings, OperationAuditDefault, settingsFromDefault } from './schema.js';

/**
 * Static per-operation audit defaults.
 *
 * Built once at startup from explicit declarations and consulted by the
 * resolver only when no dynamic rule matches the request. Lookups never mutate.
 */
export class OperationDefaults {
    private readonly entries: ReadonlyMap<string, EffectiveSettings>;

    constructor(declarations: Readonly<Record<string, OperationAuditDefault>> = {}) {
        const entries = new Map<string, EffectiveSettings>();
        for (const [operationKey, declared] of Object.entries(declarations)) {
            entries.set(operationKey, settingsFromDefault(declared));
        }
        this.entries = entries;
    }

    lookup(operationKey: string): EffectiveSettings | undefined {
        return this.entries.get(operationKey);
    }

    get size(): number {
        return this.entries.size;
    }
}
