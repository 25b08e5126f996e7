import { type Context, Hono } from 'hono';
import { safeWrapAsync } from '../src/utils/wrap.js';

export type FakeRapidPro = {
  /** Handles requests the way `fetch` would, without opening a socket */
  fetch: (input: string | URL | Request, init?: RequestInit) => Promise<Response>;
  /** Next `count` label reads answer 429 with the given Retry-After */
  throttleLabels: (count: number, retryAfterSeconds: number) => void;
  /** Request counts keyed by `METHOD path` */
  getCounts: () => Record<string, number>;
  /** JSON bodies posted to `contact_actions` */
  getContactActions: () => unknown[];
  reset: () => void;
};

export const TOKEN = 'test-secret';
export const PAGE_SIZE = 2;

type ContactRow = { uuid: string; name: string; urns: string[]; groups: Array<{ uuid: string; name: string }> };

const reporters = { uuid: 'g-reporters', name: 'Reporters' };

function seedContacts(): ContactRow[] {
  return ['Ann', 'Bob', 'Cat', 'Dan', 'Eve'].map((name, i) => ({
    uuid: `c-${i + 1}`,
    name,
    urns: [`tel:+25078800000${i + 1}`],
    groups: i % 2 === 0 ? [reporters] : [],
  }));
}

function seedGroups() {
  return [{ ...reporters, query: null, status: 'ready', system: false, count: 3 }];
}

/**
 * In-process stand-in for a RapidPro v2 API: token auth, cursor paging over a
 * small contact set, validation failures, missing objects and rate limiting.
 */
export function createFakeRapidPro(): FakeRapidPro {
  let counts: Record<string, number> = {};
  let contactActions: unknown[] = [];
  let throttle = { remaining: 0, retryAfterSeconds: 0 };
  let groups = seedGroups();
  const contacts = seedContacts();
  const app = new Hono().basePath('/api/v2');

  function increment(c: Context) {
    const key = `${c.req.method} ${c.req.path}`;
    counts[key] = (counts[key] ?? 0) + 1;
  }

  app.use('*', async (c, next) => {
    increment(c);
    if (c.req.header('authorization') !== `Token ${TOKEN}`) {
      return c.json({ detail: 'Invalid token.' }, 401);
    }

    await next();
  });

  app.get('/contacts.json', (c) => {
    const group = c.req.query('group');
    const uuid = c.req.query('uuid');
    const offset = Number(c.req.query('cursor') ?? '0');
    const matching = contacts.filter(
      (contact) =>
        (!uuid || contact.uuid === uuid) &&
        (!group || contact.groups.some((g) => g.name === group || g.uuid === group)),
    );

    const results = matching.slice(offset, offset + PAGE_SIZE);
    let next: string | null = null;
    if (offset + PAGE_SIZE < matching.length) {
      const url = new URL(c.req.url);
      url.searchParams.set('cursor', String(offset + PAGE_SIZE));
      next = url.toString();
    }

    return c.json({ next, previous: null, results });
  });

  app.get('/org.json', (c) =>
    c.json({
      uuid: 'o-1',
      name: 'Nyaruka',
      country: 'RW',
      languages: ['eng', 'kin'],
      primary_language: 'eng',
      timezone: 'Africa/Kigali',
      date_style: 'day_first',
      anon: false,
    }),
  );

  app.get('/labels.json', (c) => {
    if (throttle.remaining > 0) {
      throttle.remaining -= 1;
      c.header('Retry-After', String(throttle.retryAfterSeconds));
      return c.json({ detail: 'Request was throttled.' }, 429);
    }

    return c.json({ next: null, previous: null, results: [{ uuid: 'l-1', name: 'Spam', count: 4 }] });
  });

  app.post('/labels.json', async (c) => {
    const [errParse, body] = await safeWrapAsync<unknown>(() => c.req.json());
    if (errParse) {
      return c.json({ detail: 'JSON parse error' }, 400);
    }

    const name = typeof body === 'object' && body !== null && 'name' in body ? body.name : undefined;
    if (typeof name !== 'string' || !name) {
      return c.json({ name: ['This field is required.'] }, 400);
    }

    return c.json({ uuid: 'l-2', name, count: 0 }, 201);
  });

  app.delete('/groups.json', (c) => {
    const uuid = c.req.query('uuid');
    if (!groups.some((group) => group.uuid === uuid)) {
      return c.json({ detail: 'Not found.' }, 404);
    }

    groups = groups.filter((group) => group.uuid !== uuid);
    return c.body(null, 204);
  });

  app.post('/contact_actions.json', async (c) => {
    const [errParse, body] = await safeWrapAsync<unknown>(() => c.req.json());
    if (errParse) {
      return c.json({ detail: 'JSON parse error' }, 400);
    }

    contactActions.push(body);
    return c.body(null, 204);
  });

  return {
    fetch: async (input, init) => app.fetch(new Request(input, init)),
    throttleLabels: (count, retryAfterSeconds) => {
      throttle = { remaining: count, retryAfterSeconds };
    },
    getCounts: () => counts,
    getContactActions: () => contactActions,
    reset: () => {
      counts = {};
      contactActions = [];
      throttle = { remaining: 0, retryAfterSeconds: 0 };
      groups = seedGroups();
    },
  };
}
