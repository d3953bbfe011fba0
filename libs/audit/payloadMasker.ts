/**
 * Payload Masker
 *
 * Serializes a captured value to a JSON tree and redacts every object key that
 * case-insensitively matches a mask field. A matched key's value is replaced
 * wholesale; nothing below it is visited. Primitives only ever get masked
 * through the key that holds them.
 *
 * mask() never throws: a value that cannot be serialized yields a diagnostic
 * placeholder instead.
 */

export const MASK_TOKEN = '****';

type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

function normalizeFields(maskFields: Iterable<string>): Set<string> {
    const normalized = new Set<string>();
    for (const field of maskFields) {
        normalized.add(field.toLowerCase());
    }
    return normalized;
}

function maskNode(node: JsonValue, fields: ReadonlySet<string>): JsonValue {
    if (Array.isArray(node)) {
        return node.map(item => maskNode(item, fields));
    }
    if (node !== null && typeof node === 'object') {
        const masked: { [key: string]: JsonValue } = {};
        for (const [key, value] of Object.entries(node)) {
            // defineProperty keeps a literal "__proto__" key as data
            Object.defineProperty(masked, key, {
                value: fields.has(key.toLowerCase()) ? MASK_TOKEN : maskNode(value, fields),
                enumerable: true,
                writable: true,
                configurable: true
            });
        }
        return masked;
    }
    return node;
}

function describeFailure(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

export const PayloadMasker = {
    mask(value: unknown, maskFields: Iterable<string>): string {
        try {
            // JSON.stringify yields undefined for undefined, functions and symbols
            const serialized = JSON.stringify(value) ?? 'null';
            const fields = normalizeFields(maskFields);
            if (fields.size === 0) {
                return serialized;
            }
            const tree: JsonValue = JSON.parse(serialized);
            return JSON.stringify(maskNode(tree, fields));
        } catch (error) {
            return `[payload masking failed: ${describeFailure(error)}]`;
        }
    }
};
