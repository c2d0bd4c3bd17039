import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { serviceLoggers } from './logger';
import {
    AuthorizationDeniedError,
    AuthorizationStateMismatchError,
    AuthorizationTimeoutError,
    JobCancelledError,
} from './sync-errors';

const log = serviceLoggers.session;

const SUCCESS_PAGE = '<html><body><p>Authorization received. You may close this window.</p></body></html>';
const FAILURE_PAGE = '<html><body><p>Authorization failed. Return to the terminal for details.</p></body></html>';

const callbackQuerySchema = z.object({
    code: z.string().min(1).optional(),
    state: z.string().optional(),
    error: z.string().optional(),
});

export interface AuthorizationCallback {
    code: string;
    state: string;
}

type CallbackOutcome =
    | { ok: true; callback: AuthorizationCallback }
    | { ok: false; error: Error };

export interface WaitOptions {
    timeoutMs: number;
    expectedState?: string;
    signal?: AbortSignal;
}

/**
 * Single-use loopback HTTP listener for the OAuth redirect. Accepts exactly one
 * callback on `path`, then shuts down; also shuts down on timeout or cancellation.
 */
export class CallbackListener {
    readonly server: FastifyInstance;
    private readonly outcome: Promise<CallbackOutcome>;
    private settle: (outcome: CallbackOutcome) => void = () => undefined;
    private settled = false;

    constructor(readonly path: string) {
        this.server = Fastify({ logger: false });
        this.outcome = new Promise<CallbackOutcome>(resolve => {
            this.settle = resolve;
        });

        this.server.get(path, async (request, reply) => {
            const query = callbackQuerySchema.safeParse(request.query);
            reply.type('text/html');

            if (this.settled) {
                return reply.code(409).send(FAILURE_PAGE);
            }
            if (!query.success) {
                this.finish({ ok: false, error: new AuthorizationDeniedError('malformed callback') });
                return reply.code(400).send(FAILURE_PAGE);
            }

            const { code, state, error } = query.data;
            if (error !== undefined || code === undefined) {
                this.finish({ ok: false, error: new AuthorizationDeniedError(error ?? 'no code returned') });
                return reply.code(400).send(FAILURE_PAGE);
            }

            this.finish({ ok: true, callback: { code, state: state ?? '' } });
            return reply.send(SUCCESS_PAGE);
        });
    }

    async listen(port: number, host = '127.0.0.1'): Promise<string> {
        const address = await this.server.listen({ port, host });
        log.debug({ address, path: this.path }, 'Authorization callback listener started');
        return address;
    }

    async waitForCallback(options: WaitOptions): Promise<AuthorizationCallback> {
        let timer: NodeJS.Timeout | undefined;
        const onAbort = () => this.finish({ ok: false, error: new JobCancelledError('Authorization cancelled') });

        try {
            if (options.signal?.aborted) {
                onAbort();
            }
            options.signal?.addEventListener('abort', onAbort, { once: true });
            timer = setTimeout(
                () => this.finish({ ok: false, error: new AuthorizationTimeoutError(options.timeoutMs) }),
                options.timeoutMs
            );

            const outcome = await this.outcome;
            if (!outcome.ok) {
                throw outcome.error;
            }
            if (options.expectedState !== undefined && outcome.callback.state !== options.expectedState) {
                throw new AuthorizationStateMismatchError();
            }
            return outcome.callback;
        } finally {
            clearTimeout(timer);
            options.signal?.removeEventListener('abort', onAbort);
            await this.close();
        }
    }

    async close(): Promise<void> {
        await this.server.close();
    }

    private finish(outcome: CallbackOutcome): void {
        if (this.settled) {
            return;
        }
        this.settled = true;
        this.settle(outcome);
    }
}
