import fs from 'fs-extra';
import path from 'path';
import { z } from 'zod';
import { RestartOutcome, RestartRecord } from '../../../../shared/types';
import { Logger } from '../../utils/logger';
import { describeError } from '../../utils/AppError';

const HistoryEventSchema = z.discriminatedUnion('event', [
    z.object({
        event: z.literal('attempt'),
        timestamp: z.number(),
        reason: z.string(),
        cooldownAppliedSeconds: z.number().nonnegative()
    }),
    z.object({
        event: z.literal('outcome'),
        timestamp: z.number(),
        outcome: z.enum(['PENDING', 'SUCCESS', 'FAILED'])
    }),
    z.object({
        event: z.literal('reset'),
        timestamp: z.number()
    })
]);

type HistoryEvent = z.infer<typeof HistoryEventSchema>;

/**
 * Append-only restart log stored as JSON Lines. Outcome updates and operator resets are
 * appended as their own events and folded back into records on load.
 */
export class RestartHistory {
    private records: RestartRecord[] = [];
    private resetIndex = 0;

    /** `file` null keeps the history in memory only. */
    constructor(private readonly file: string | null, private readonly logger: Logger) {}

    get entries(): readonly RestartRecord[] {
        return this.records;
    }

    /** Records appended after the most recent reset marker. */
    get sinceReset(): readonly RestartRecord[] {
        return this.records.slice(this.resetIndex);
    }

    async load(): Promise<void> {
        this.records = [];
        this.resetIndex = 0;
        if (!this.file || !(await fs.pathExists(this.file))) return;

        const content = await fs.readFile(this.file, 'utf-8');
        let skipped = 0;
        for (const line of content.split('\n')) {
            if (!line.trim()) continue;
            let raw: unknown;
            try {
                raw = JSON.parse(line);
            } catch {
                skipped++;
                continue;
            }
            const parsed = HistoryEventSchema.safeParse(raw);
            if (!parsed.success) {
                skipped++;
                continue;
            }
            this.apply(parsed.data);
        }

        if (skipped > 0) {
            this.logger.warn(`[RestartHistory] Ignored ${skipped} unreadable line(s) in ${path.basename(this.file)}.`);
        }
        this.logger.debug(`[RestartHistory] Loaded ${this.records.length} restart record(s).`);
    }

    async appendAttempt(timestamp: number, reason: string, cooldownAppliedSeconds: number): Promise<RestartRecord> {
        const event: HistoryEvent = { event: 'attempt', timestamp, reason, cooldownAppliedSeconds };
        this.apply(event);
        await this.persist(event);
        return this.records[this.records.length - 1];
    }

    async appendOutcome(timestamp: number, outcome: RestartOutcome): Promise<void> {
        if (this.records.length === 0) return;
        const event: HistoryEvent = { event: 'outcome', timestamp, outcome };
        this.apply(event);
        await this.persist(event);
    }

    async appendReset(timestamp: number): Promise<void> {
        const event: HistoryEvent = { event: 'reset', timestamp };
        this.apply(event);
        await this.persist(event);
    }

    private apply(event: HistoryEvent) {
        switch (event.event) {
            case 'attempt':
                this.records.push({
                    timestamp: event.timestamp,
                    reason: event.reason,
                    outcome: 'PENDING',
                    cooldownAppliedSeconds: event.cooldownAppliedSeconds
                });
                break;
            case 'outcome': {
                const latest = this.records[this.records.length - 1];
                if (latest) latest.outcome = event.outcome;
                break;
            }
            case 'reset':
                this.resetIndex = this.records.length;
                break;
        }
    }

    private async persist(event: HistoryEvent) {
        if (!this.file) return;
        try {
            await fs.ensureDir(path.dirname(this.file));
            await fs.appendFile(this.file, JSON.stringify(event) + '\n');
        } catch (e) {
            // The in-memory record still counts toward the window for this run
            this.logger.error(`[RestartHistory] Failed to append to ${this.file}: ${describeError(e)}`);
        }
    }
}
