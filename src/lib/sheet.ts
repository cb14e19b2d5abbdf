// Client for the spreadsheet web app that stores raw logs, audit rows and workouts
//
// GET actions carry their parameters in the query string and answer {ok, ...};
// POST actions send a JSON body and succeed or fail by HTTP status alone
// (the web app redirects after a write, so the body is not read).

import { z } from 'zod';
import type { SheetConfig } from './config.js';
import { UpstreamError, errorMessage } from './errors.js';
import type { FetchFn } from './llm.js';
import type { WorkoutCounter } from './workout-id.js';
import type { RawLogEntry } from '../types/index.js';

export interface RawLogSource {
  fetchRawLogs(limit: number): Promise<RawLogEntry[]>;
}

export interface SheetPoster {
  post(payload: Record<string, unknown>): Promise<void>;
}

// Sheet cells come back as strings, numbers or empty
const cell = z
  .union([z.string(), z.number(), z.boolean()])
  .nullish()
  .transform(v => (v === null || v === undefined ? '' : String(v)));

const rawLogEntrySchema = z.object({
  timestamp: cell,
  user_id: cell,
  raw_text: cell
});

const envelopeSchema = z.object({
  ok: z.boolean(),
  error: z.string().optional()
}).passthrough();

const rawLogsSchema = z.object({ items: z.array(rawLogEntrySchema) });
const countSchema = z.object({
  count: z.union([z.number(), z.string().min(1)]).pipe(z.coerce.number().int().nonnegative())
});

export class SheetClient implements RawLogSource, WorkoutCounter, SheetPoster {
  constructor(private readonly config: SheetConfig, private readonly fetchFn: FetchFn = fetch) {}

  private async request(init: RequestInit & { url: string }, label: string): Promise<Response> {
    const { url, ...rest } = init;
    let response: Response;
    try {
      response = await this.fetchFn(url, {
        ...rest,
        redirect: 'follow',
        signal: AbortSignal.timeout(this.config.timeoutMs)
      });
    } catch (err) {
      throw new UpstreamError(`Sheet ${label} failed: ${errorMessage(err)}`, { cause: err });
    }

    if (!response.ok) {
      const text = await response.text().catch(() => '');
      throw new UpstreamError(`Sheet ${label} returned HTTP ${response.status}: ${text.slice(0, 200)}`);
    }
    return response;
  }

  /**
   * Run a read action and return its payload once `ok` is confirmed.
   */
  async get(action: string, params: Record<string, string>): Promise<Record<string, unknown>> {
    const url = new URL(this.config.url);
    url.searchParams.set('action', action);
    url.searchParams.set('secret', this.config.secret);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }

    const response = await this.request({ url: url.toString(), method: 'GET' }, action);

    let body: unknown;
    try {
      body = await response.json();
    } catch (err) {
      throw new UpstreamError(`Sheet ${action} returned a non-JSON body`, { cause: err });
    }

    const envelope = envelopeSchema.safeParse(body);
    if (!envelope.success) {
      throw new UpstreamError(`Sheet ${action} returned a malformed payload (missing ok flag)`);
    }
    if (!envelope.data.ok) {
      throw new UpstreamError(`Sheet ${action} failed: ${envelope.data.error ?? 'Unknown sheet error'}`);
    }
    return envelope.data;
  }

  async post(payload: Record<string, unknown>): Promise<void> {
    const label = typeof payload.action === 'string' ? payload.action : 'append_raw';
    await this.request({
      url: this.config.url,
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ ...payload, secret: this.config.secret })
    }, label);
  }

  async fetchRawLogs(limit: number): Promise<RawLogEntry[]> {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError(`limit must be a positive integer, got ${limit}`);
    }
    const data = await this.get('get_raw', { limit: String(limit) });
    const parsed = rawLogsSchema.safeParse(data);
    if (!parsed.success) {
      throw new UpstreamError('Sheet get_raw returned malformed items');
    }
    return parsed.data.items;
  }

  async countWorkoutsForDate(date: string): Promise<number> {
    const data = await this.get('get_workouts_by_date', { date });
    const parsed = countSchema.safeParse(data);
    if (!parsed.success) {
      throw new UpstreamError(`Sheet get_workouts_by_date returned no usable count for ${date}`);
    }
    return parsed.data.count;
  }
}
