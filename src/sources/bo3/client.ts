import { setTimeout as sleep } from 'node:timers/promises';
import { request, type Dispatcher } from 'undici';
import { z } from 'zod';
import { config } from '../../config.js';
import { UpstreamError } from '../../errors.js';
import { jsonObjectSchema } from '../../utils/json.js';
import { logger } from '../../utils/logger.js';
import type { JsonObject } from '../../types/json.js';

export interface Bo3ClientOptions {
  baseUrl: string;
  disciplineId: number;
  pageLimit: number;
  timeoutMs: number;
  /** Delay before every request that is not a retry */
  rateLimitMs: number;
  maxRetries: number;
  /** Base of the exponential backoff: retryDelayMs * 2^attempt */
  retryDelayMs: number;
  /** Custom undici dispatcher; the global one when omitted */
  dispatcher?: Dispatcher;
}

export interface MatchQuery {
  status?: string[];
  tier?: string[];
  tournamentIds?: number[];
  startDateGte?: Date;
  startDateLte?: Date;
  /** Related resources to embed, e.g. teams, tournament, ai_predictions */
  include?: string[];
  sort?: string;
  /** Follow pagination to the last page (default true) */
  allPages?: boolean;
}

const DEFAULT_STATUS = ['upcoming', 'current'];
const DEFAULT_TIERS = ['s', 'a'];
const DEFAULT_INCLUDE = ['teams', 'tournament', 'ai_predictions', 'games'];

const DEFAULT_HEADERS: Record<string, string> = {
  Accept: 'application/json',
  'User-Agent': 'esports-ingest/1.0',
};

const pageSchema = z.object({
  results: z.array(jsonObjectSchema).default([]),
  total: z
    .object({
      count: z.number().optional(),
      limit: z.number().optional(),
    })
    .optional(),
});

/** Distinct tournament ids referenced by a set of match payloads. */
export function collectTournamentIds(matches: readonly JsonObject[]): Set<number> {
  const ids = new Set<number>();
  for (const match of matches) {
    const tournament = match['tournament'];
    if (tournament && typeof tournament === 'object' && !Array.isArray(tournament)) {
      const id = tournament['id'];
      if (typeof id === 'number' && id) ids.add(id);
    }
  }
  return ids;
}

export class Bo3Client {
  private readonly options: Bo3ClientOptions;
  private readonly log = logger.child({ client: 'bo3' });

  constructor(options: Partial<Bo3ClientOptions> = {}) {
    this.options = {
      baseUrl: config.BO3_API_URL,
      disciplineId: config.BO3_DISCIPLINE_ID,
      pageLimit: config.BO3_PAGE_LIMIT,
      timeoutMs: config.BO3_TIMEOUT_MS,
      rateLimitMs: config.BO3_RATE_LIMIT_MS,
      maxRetries: config.BO3_MAX_RETRIES,
      retryDelayMs: config.BO3_RETRY_DELAY_MS,
      ...options,
    };
  }

  buildMatchParams(query: MatchQuery, offset: number): URLSearchParams {
    const params = new URLSearchParams({
      'page[offset]': String(offset),
      'page[limit]': String(this.options.pageLimit),
      sort: query.sort ?? 'start_date',
      'filter[matches.discipline_id][eq]': String(this.options.disciplineId),
      'filter[matches.team1_id][not_eq_null]': '',
      'filter[matches.team2_id][not_eq_null]': '',
    });

    const status = query.status ?? DEFAULT_STATUS;
    const tier = query.tier ?? DEFAULT_TIERS;
    const include = query.include ?? DEFAULT_INCLUDE;

    if (status.length > 0) params.set('filter[matches.status][in]', status.join(','));
    if (tier.length > 0) params.set('filter[matches.tier][in]', tier.join(','));
    if (query.tournamentIds && query.tournamentIds.length > 0) {
      params.set('filter[matches.tournament_id][in]', query.tournamentIds.join(','));
    }
    if (query.startDateGte) params.set('filter[matches.start_date][gte]', query.startDateGte.toISOString());
    if (query.startDateLte) params.set('filter[matches.start_date][lte]', query.startDateLte.toISOString());
    if (include.length > 0) params.set('with', include.join(','));

    return params;
  }

  /** Fetch match payloads, following pagination unless `allPages` is false. */
  async fetchMatches(query: MatchQuery = {}): Promise<JsonObject[]> {
    const matches: JsonObject[] = [];
    let offset = 0;

    for (;;) {
      const body = await this.getJson('/matches', this.buildMatchParams(query, offset));
      const page = pageSchema.safeParse(body);
      if (!page.success) {
        throw new UpstreamError('Unexpected /matches response shape', null, { cause: page.error });
      }

      const { results, total } = page.data;
      matches.push(...results);

      const count = total?.count ?? 0;
      const limit = total?.limit ?? this.options.pageLimit;

      if (query.allPages === false || offset + limit >= count) break;
      if (results.length === 0) break;
      offset += limit;
    }

    this.log.info({ count: matches.length }, 'Fetched matches');
    return matches;
  }

  /** Upcoming and live matches starting within the next `daysAhead` days. */
  async fetchUpcomingMatches(daysAhead = 7, query: MatchQuery = {}): Promise<JsonObject[]> {
    const now = new Date();
    const windowEnd = new Date(now.getTime() + daysAhead * 24 * 60 * 60 * 1000);
    this.log.info({ from: now.toISOString(), to: windowEnd.toISOString() }, 'Fetching upcoming matches');

    return this.fetchMatches({
      ...query,
      status: DEFAULT_STATUS,
      startDateGte: now,
      startDateLte: windowEnd,
    });
  }

  /** Resolves to null when the match does not exist upstream. */
  async fetchMatchById(id: number, include: string[] = DEFAULT_INCLUDE): Promise<JsonObject | null> {
    const params = new URLSearchParams();
    if (include.length > 0) params.set('with', include.join(','));

    let body: unknown;
    try {
      body = await this.getJson(`/matches/${id}`, params);
    } catch (err) {
      if (err instanceof UpstreamError && err.statusCode === 404) {
        this.log.warn({ matchId: id }, 'Match not found upstream');
        return null;
      }
      throw err;
    }

    const match = jsonObjectSchema.safeParse(body);
    if (!match.success) {
      throw new UpstreamError(`Unexpected /matches/${id} response shape`, null, { cause: match.error });
    }
    return match.data;
  }

  /** Upcoming matches carrying an AI prediction, and odds when `requireOdds` is set. */
  async getMatchesWithPredictions(
    opts: { daysAhead?: number; requireOdds?: boolean } & Pick<MatchQuery, 'tier' | 'tournamentIds'> = {},
  ): Promise<JsonObject[]> {
    const { daysAhead = 7, requireOdds = false, ...query } = opts;
    const matches = await this.fetchUpcomingMatches(daysAhead, query);

    const filtered = matches.filter((m) => {
      if (m['ai_predictions'] == null) return false;
      if (requireOdds && m['bet_updates'] == null) return false;
      return true;
    });

    this.log.info({ count: filtered.length, requireOdds }, 'Matches with AI predictions');
    return filtered;
  }

  private async getJson(endpoint: string, params: URLSearchParams, attempt = 0): Promise<unknown> {
    const { rateLimitMs, maxRetries, retryDelayMs, timeoutMs, dispatcher } = this.options;
    const query = params.toString();
    const url = `${this.options.baseUrl}${endpoint}${query ? `?${query}` : ''}`;

    if (attempt === 0 && rateLimitMs > 0) await sleep(rateLimitMs);

    let response: Dispatcher.ResponseData;
    try {
      response = await request(url, {
        method: 'GET',
        headers: DEFAULT_HEADERS,
        headersTimeout: timeoutMs,
        bodyTimeout: timeoutMs,
        dispatcher,
      });
    } catch (err) {
      if (attempt < maxRetries) {
        const waitMs = retryDelayMs * 2 ** attempt;
        this.log.warn({ endpoint, err, waitMs }, 'Request failed, retrying');
        await sleep(waitMs);
        return this.getJson(endpoint, params, attempt + 1);
      }
      throw new UpstreamError(`Request to ${endpoint} failed after ${maxRetries} retries`, null, {
        cause: err,
      });
    }

    const { statusCode, body } = response;

    if (statusCode === 429) {
      await body.dump();
      if (attempt < maxRetries) {
        const waitMs = retryDelayMs * 2 ** attempt;
        this.log.warn({ endpoint, waitMs }, 'Rate limited, retrying');
        await sleep(waitMs);
        return this.getJson(endpoint, params, attempt + 1);
      }
      throw new UpstreamError(`Rate limited on ${endpoint} after ${maxRetries} retries`, statusCode);
    }

    if (statusCode >= 400) {
      await body.dump();
      throw new UpstreamError(`HTTP ${statusCode} from ${endpoint}`, statusCode);
    }

    try {
      return await body.json();
    } catch (err) {
      throw new UpstreamError(`Invalid JSON from ${endpoint}`, statusCode, { cause: err });
    }
  }
}
