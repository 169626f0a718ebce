import fs from 'fs-extra';
import path from 'path';
import { z } from 'zod';
import { ControlRequest } from '../../../../shared/types';
import { Logger } from '../../utils/logger';
import { describeError } from '../../utils/AppError';

export const ControlRequestSchema: z.ZodType<ControlRequest> = z.discriminatedUnion('type', [
    z.object({ type: z.literal('stop'), graceful: z.boolean(), timeoutSeconds: z.number().int().positive().optional() }),
    z.object({ type: z.literal('restart'), reason: z.string().optional() }),
    z.object({ type: z.literal('reset') }),
    z.object({ type: z.literal('command'), text: z.string().min(1) }),
    z.object({ type: z.literal('backup'), name: z.string().optional() })
]);

const REQUEST_EXT = '.json';

/**
 * File-drop mailbox through which short-lived CLI invocations reach the running loop.
 * Each request is one file, named so that lexical order is arrival order.
 */
export class ControlInbox {
    private sequence = 0;

    constructor(private readonly dir: string, private readonly logger: Logger) {}

    async submit(request: ControlRequest, now: number = Date.now()): Promise<string> {
        await fs.ensureDir(this.dir);
        const base = `${String(now).padStart(15, '0')}-${process.pid}-${String(this.sequence++).padStart(4, '0')}`;
        const target = path.join(this.dir, base + REQUEST_EXT);
        const tmp = path.join(this.dir, `${base}.tmp`);
        await fs.writeJSON(tmp, request);
        await fs.rename(tmp, target);
        return target;
    }

    /** Removes and returns every pending request, oldest first. */
    async drain(): Promise<ControlRequest[]> {
        if (!(await fs.pathExists(this.dir))) return [];

        const files = (await fs.readdir(this.dir)).filter(f => f.endsWith(REQUEST_EXT)).sort();
        const requests: ControlRequest[] = [];

        for (const file of files) {
            const full = path.join(this.dir, file);
            try {
                const raw: unknown = await fs.readJSON(full);
                const parsed = ControlRequestSchema.safeParse(raw);
                if (parsed.success) {
                    requests.push(parsed.data);
                } else {
                    this.logger.warn(`[ControlInbox] Discarding malformed request ${file}.`);
                }
            } catch (e) {
                this.logger.warn(`[ControlInbox] Discarding unreadable request ${file}: ${describeError(e)}`);
            }
            await fs.remove(full);
        }

        return requests;
    }
}
