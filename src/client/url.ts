/**
 * URL builders for the NationStates API.
 * Shards can be plain names or `{ q, ...params }` objects; every `q` is
 * joined into one space-separated query.
 */

export const API_URL = 'https://www.nationstates.net/cgi-bin/api.cgi';

/** A shard with its own parameters, e.g. `{ q: 'census', scale: '65' }`. */
export interface ShardQuery {
  q: string;
  [param: string]: string;
}

export type Shard = string | ShardQuery;

export type QueryParams = Record<string, string | number>;

/** Build a shard object. */
export function shard(q: string, params: Record<string, string> = {}): ShardQuery {
  return { ...params, q };
}

/** World-level request; also the basis of every other builder. */
export function worldUrl(shards: Shard[] = [], params: QueryParams = {}, base: string = API_URL): URL {
  const url = new URL(base);
  const q: string[] = [];
  const query = new Map<string, string>();

  const { q: explicitQ, ...rest } = params;
  if (explicitQ !== undefined) q.push(String(explicitQ));

  for (const entry of shards) {
    if (typeof entry === 'string') {
      q.push(entry);
      continue;
    }
    const { q: shardQ, ...shardParams } = entry;
    q.push(shardQ);
    for (const [key, value] of Object.entries(shardParams)) query.set(key, value);
  }

  const joined = q.filter((part) => part !== '').join(' ');
  if (joined) query.set('q', joined);
  for (const [key, value] of Object.entries(rest)) query.set(key, String(value));

  for (const [key, value] of query) url.searchParams.set(key, value);
  return url;
}

export function nationUrl(
  nation: string,
  shards: Shard[] = [],
  params: QueryParams = {},
  base?: string,
): URL {
  return worldUrl(shards, { ...params, nation }, base);
}

export function regionUrl(
  region: string,
  shards: Shard[] = [],
  params: QueryParams = {},
  base?: string,
): URL {
  return worldUrl(shards, { ...params, region }, base);
}

/** World Assembly request; council 1 is the General Assembly, 2 the Security Council. */
export function waUrl(council: 1 | 2, shards: Shard[] = [], params: QueryParams = {}, base?: string): URL {
  return worldUrl(shards, { ...params, wa: council }, base);
}

/** Private command for a nation (`c=...`). */
export function commandUrl(nation: string, command: string, params: QueryParams = {}, base?: string): URL {
  return worldUrl([], { nation, c: command, ...params }, base);
}

export function telegramUrl(
  params: { client: string; tgid: string; key: string; to: string },
  base?: string,
): URL {
  return worldUrl(
    [],
    { a: 'sendtg', client: params.client, tgid: params.tgid, key: params.key, to: params.to },
    base,
  );
}

function isoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/** Daily nations dump; the current one when no date is given. */
export function nationsDumpUrl(date?: Date, base: string = API_URL): URL {
  const path = date ? `/archive/nations/${isoDate(date)}-nations-xml.gz` : '/pages/nations.xml.gz';
  return new URL(path, base);
}

/** Daily regions dump; the current one when no date is given. */
export function regionsDumpUrl(date?: Date, base: string = API_URL): URL {
  const path = date ? `/archive/regions/${isoDate(date)}-regions-xml.gz` : '/pages/regions.xml.gz';
  return new URL(path, base);
}

export function cardsDumpUrl(season: 1 | 2 | 3, base: string = API_URL): URL {
  return new URL(`/pages/cardlist_S${season}.xml.gz`, base);
}

/** Whether `target` is the paced API endpoint itself (dumps are not). */
export function isApiEndpoint(target: URL, base: string = API_URL): boolean {
  const api = new URL(base);
  return target.origin === api.origin && target.pathname === api.pathname;
}

/** Whether `target` is served by the API's host. */
export function isApiHost(target: URL, base: string = API_URL): boolean {
  return target.host === new URL(base).host;
}
