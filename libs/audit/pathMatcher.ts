/**
 * Ant-style path patterns.
 *
 *   ?               one character within a segment
 *   *               zero or more characters within a segment
 *   **              zero or more whole segments
 *   {name}          one segment (template variable)
 *   {name:regex}    one segment matching regex
 *
 * Patterns are compiled once, when a rule snapshot is built.
 */

const SEPARATOR = '/';
const DOUBLE_WILDCARD = '**';

type SegmentMatcher = typeof DOUBLE_WILDCARD | RegExp;

function tokenize(value: string): string[] {
    return value.split(SEPARATOR).filter(token => token.length > 0);
}

function escapeLiteral(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Translate one pattern segment into an anchored regex.
 */
function compileSegment(segment: string): RegExp {
    let source = '';
    let literal = '';
    let i = 0;

    const flushLiteral = () => {
        source += escapeLiteral(literal);
        literal = '';
    };

    while (i < segment.length) {
        const ch = segment[i];
        if (ch === '*') {
            flushLiteral();
            source += '.*';
            i += 1;
        } else if (ch === '?') {
            flushLiteral();
            source += '.';
            i += 1;
        } else if (ch === '{') {
            // Find the matching close brace; variable regexes may nest braces.
            let depth = 1;
            let j = i + 1;
            while (j < segment.length && depth > 0) {
                if (segment[j] === '{') depth += 1;
                else if (segment[j] === '}') depth -= 1;
                j += 1;
            }
            if (depth !== 0) {
                throw new Error(`Unbalanced template variable in path segment "${segment}"`);
            }
            flushLiteral();
            const body = segment.slice(i + 1, j - 1);
            const colon = body.indexOf(':');
            source += colon === -1 ? '(.*)' : `(${body.slice(colon + 1)})`;
            i = j;
        } else {
            literal += ch;
            i += 1;
        }
    }
    flushLiteral();

    return new RegExp(`^${source}$`);
}

export class AntPathPattern {
    private readonly tokens: readonly string[];
    private readonly segments: readonly SegmentMatcher[];
    private readonly rooted: boolean;
    private readonly trailingSeparator: boolean;

    constructor(public readonly pattern: string) {
        this.rooted = pattern.startsWith(SEPARATOR);
        this.trailingSeparator = pattern.endsWith(SEPARATOR);
        this.tokens = tokenize(pattern);
        this.segments = this.tokens.map(token =>
            token === DOUBLE_WILDCARD ? DOUBLE_WILDCARD : compileSegment(token)
        );
    }

    matches(path: string): boolean {
        if (path.startsWith(SEPARATOR) !== this.rooted) {
            return false;
        }
        return this.matchFrom(0, tokenize(path), 0, path.endsWith(SEPARATOR));
    }

    private matchFrom(patternIdx: number, pathTokens: string[], pathIdx: number, pathTrailing: boolean): boolean {
        while (patternIdx < this.segments.length) {
            const segment = this.segments[patternIdx];
            if (segment === DOUBLE_WILDCARD) {
                // Collapse consecutive ** and try every split point.
                let next = patternIdx;
                while (next < this.segments.length && this.segments[next] === DOUBLE_WILDCARD) next += 1;
                if (next === this.segments.length) return true;
                for (let k = pathIdx; k <= pathTokens.length; k += 1) {
                    if (this.matchFrom(next, pathTokens, k, pathTrailing)) return true;
                }
                return false;
            }
            const token = pathTokens[pathIdx];
            // A lone trailing * also matches an empty last segment: /api/* matches /api/
            if (token === undefined && pathTrailing && patternIdx === this.segments.length - 1 && this.tokens[patternIdx] === '*') {
                return true;
            }
            if (segment === undefined || token === undefined || !segment.test(token)) {
                return false;
            }
            patternIdx += 1;
            pathIdx += 1;
        }

        if (pathIdx < pathTokens.length) {
            return false;
        }
        return this.trailingSeparator === pathTrailing;
    }
}
