/**
 * Audit Sink
 *
 * Fire-and-forget persistence of completed audit records:
 * - submit() enqueues and returns immediately
 * - a fixed number of workers drain the queue concurrently
 * - saturation queues, it never rejects
 * - a failed store is logged and the record dropped (no retry)
 */

import os from 'node:os';
import { logger } from '../logging/logger.js';
import { AuditRecord } from './schema.js';

const log = logger.child({ component: 'AuditSink' });

/**
 * Storage boundary used exclusively by the sink's workers.
 */
export interface AuditPersistence {
    store(record: AuditRecord): Promise<void>;
}

export interface AuditSinkStats {
    queued: number;
    active: number;
    persisted: number;
    failed: number;
}

export function defaultWorkerPoolSize(): number {
    return Math.max(1, os.availableParallelism());
}

export class AuditSink {
    private readonly queue: AuditRecord[] = [];
    private active = 0;
    private persisted = 0;
    private failed = 0;
    private idleWaiters: Array<() => void> = [];

    constructor(
        private readonly persistence: AuditPersistence,
        private readonly poolSize: number = defaultWorkerPoolSize()
    ) {
        if (!Number.isInteger(poolSize) || poolSize < 1) {
            throw new Error(`Audit worker pool size must be a positive integer, got ${poolSize}`);
        }
    }

    /**
     * Enqueue a record for persistence. Never throws, never waits.
     */
    public submit(record: AuditRecord): void {
        this.queue.push(record);
        this.pump();
    }

    /**
     * Resolves once every submitted record has been persisted or dropped.
     */
    public drain(): Promise<void> {
        if (this.isIdle()) {
            return Promise.resolve();
        }
        return new Promise(resolve => {
            this.idleWaiters.push(resolve);
        });
    }

    public stats(): AuditSinkStats {
        return {
            queued: this.queue.length,
            active: this.active,
            persisted: this.persisted,
            failed: this.failed
        };
    }

    private isIdle(): boolean {
        return this.queue.length === 0 && this.active === 0;
    }

    private pump(): void {
        while (this.active < this.poolSize) {
            const record = this.queue.shift();
            if (!record) break;
            this.active += 1;
            // Deferred so that submit() returns before any store work begins.
            setImmediate(() => {
                void this.persist(record);
            });
        }
    }

    private async persist(record: AuditRecord): Promise<void> {
        try {
            await this.persistence.store(record);
            this.persisted += 1;
        } catch (error) {
            this.failed += 1;
            log.error(
                { error, auditTraceId: record.traceId, path: record.path, httpMethod: record.httpMethod },
                'Audit record persistence failed; record dropped'
            );
        } finally {
            this.active -= 1;
            this.pump();
            this.notifyIfIdle();
        }
    }

    private notifyIfIdle(): void {
        if (!this.isIdle()) return;
        const waiters = this.idleWaiters;
        this.idleWaiters = [];
        for (const resolve of waiters) {
            resolve();
        }
    }
}
