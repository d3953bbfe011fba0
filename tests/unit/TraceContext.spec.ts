/**
 * Unit Tests: TraceContext
 *
 * @see libs/context/traceContext.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { TraceContext } from '../../libs/context/traceContext.js';

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

describe('TraceContext', () => {
    it('should be empty outside any scope', () => {
        assert.strictEqual(TraceContext.current(), undefined);
    });

    it('should use a supplied, non-blank id', async () => {
        const seen = await TraceContext.run('  trace-abc  ', traceId => {
            assert.strictEqual(traceId, 'trace-abc');
            return TraceContext.current();
        });
        assert.strictEqual(seen, 'trace-abc');
    });

    it('should generate a UUID for a missing or blank id', async () => {
        for (const incoming of [undefined, null, '', '   ']) {
            const traceId = await TraceContext.run(incoming, id => id);
            assert.match(traceId, UUID_PATTERN);
        }
    });

    it('should clear the id when the scope completes normally', async () => {
        let inside: string | undefined;
        let later: Promise<string | undefined> | undefined;
        await TraceContext.run('req-1', async () => {
            inside = TraceContext.current();
            // Work scheduled inside the scope outlives it.
            later = new Promise(resolve => setTimeout(() => resolve(TraceContext.current()), 20));
        });
        assert.strictEqual(inside, 'req-1');
        assert.strictEqual(await later, undefined);
    });

    it('should clear the id and propagate when the scope throws', async () => {
        let later: Promise<string | undefined> | undefined;
        await assert.rejects(
            TraceContext.run('req-err', async () => {
                later = new Promise(resolve => setTimeout(() => resolve(TraceContext.current()), 20));
                throw new Error('handler failed');
            }),
            /handler failed/
        );
        assert.strictEqual(await later, undefined);
    });

    it('should not hand a cleared id to a later begin() in the same context', async () => {
        await TraceContext.run('first', async () => {
            assert.strictEqual(TraceContext.current(), 'first');
            TraceContext.clear();
            assert.strictEqual(TraceContext.current(), undefined);

            const next = TraceContext.begin();
            assert.notStrictEqual(next, 'first');
            assert.match(next, UUID_PATTERN);

            TraceContext.clear();
            assert.strictEqual(TraceContext.begin('first'), 'first');
        });
    });

    it('should keep concurrent requests isolated', async () => {
        const flowA = TraceContext.run('trace-A', async () => {
            await new Promise(resolve => setTimeout(resolve, 30));
            return TraceContext.current();
        });
        const flowB = TraceContext.run('trace-B', async () => {
            await new Promise(resolve => setTimeout(resolve, 10));
            return TraceContext.current();
        });

        assert.deepStrictEqual(await Promise.all([flowA, flowB]), ['trace-A', 'trace-B']);
    });
});
