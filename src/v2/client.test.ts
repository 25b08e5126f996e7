import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ConnectionError } from '../error/connectionError.js';
import { DecodeError } from '../error/decodeError.js';
import { NotFoundError } from '../error/notFoundError.js';
import { RateLimitError } from '../error/rateLimitError.js';
import { ValidationError } from '../error/validationError.js';
import { RapidProClient, type RapidProClientProps } from './client.js';
import { Contact } from './models.js';

const ROOT = 'https://rapidpro.example.com/api/v2';

const json = (body: unknown, init: ResponseInit = {}) =>
  new Response(JSON.stringify(body), {
    status: 200,
    ...init,
    headers: { 'Content-Type': 'application/json', ...init.headers },
  });

const ann = {
  uuid: 'c-1',
  name: 'Ann',
  status: 'active',
  language: 'eng',
  urns: ['tel:+250788000001'],
  groups: [{ uuid: 'g-1', name: 'Reporters' }],
  flow: null,
  fields: { nickname: 'Annie', age: null },
  created_on: '2024-01-02T03:04:05.123456Z',
  modified_on: '2024-01-03T00:00:00Z',
  last_seen_on: null,
};

describe('RapidProClient', () => {
  const mockedFetch = vi.fn<typeof fetch>();

  beforeEach(() => {
    vi.stubGlobal('fetch', mockedFetch);
  });

  afterEach(() => {
    mockedFetch.mockReset();
    vi.unstubAllGlobals();
  });

  const client = (props: Partial<RapidProClientProps> = {}) =>
    new RapidProClient({ host: 'rapidpro.example.com', token: 'test-secret', ...props });

  const urlOfCall = (index: number) => mockedFetch.mock.calls[index]?.[0];
  const initOfCall = (index: number) => mockedFetch.mock.calls[index]?.[1];
  const headersOfCall = (index: number): Headers => {
    const headers = initOfCall(index)?.headers;
    return headers instanceof Headers ? headers : new Headers();
  };

  describe('setup', () => {
    it('expect a bare host to resolve to the v2 API root', () => {
      expect(client().rootUrl).toBe(ROOT);
    });

    it('expect a URL host to be used as the root without trailing slash', () => {
      expect(client({ host: 'http://localhost:8000/api/v2/' }).rootUrl).toBe('http://localhost:8000/api/v2');
    });

    it('expect auth, JSON and user agent headers on every request', async () => {
      mockedFetch.mockResolvedValueOnce(json({ results: [], next: null }));

      await client({ userAgent: 'survey-app/2.1' }).getGroups().first();

      const headers = headersOfCall(0);
      expect(headers.get('authorization')).toBe('Token test-secret');
      expect(headers.get('accept')).toBe('application/json');
      expect(headers.get('content-type')).toBe('application/json');
      expect(headers.get('user-agent')).toBe('survey-app/2.1 rapidpro-client/1.0.0');
    });

    it('expect the library alone in the user agent when none is given', async () => {
      mockedFetch.mockResolvedValueOnce(json({ results: [], next: null }));

      await client().getGroups().first();

      expect(headersOfCall(0).get('user-agent')).toBe('rapidpro-client/1.0.0');
    });

    it('expect config to swap the token for later requests', async () => {
      mockedFetch.mockResolvedValueOnce(json({ results: [], next: null }));
      const api = client();

      api.config({ token: 'other-secret' });
      await api.getGroups().first();

      expect(headersOfCall(0).get('authorization')).toBe('Token other-secret');
    });
  });

  describe('reads', () => {
    it('expect filters serialized into the query string', async () => {
      mockedFetch.mockResolvedValueOnce(json({ results: [ann], next: null }));

      const [err, contacts] = await client()
        .getContacts({ group: 'Reporters', deleted: false, after: new Date(Date.UTC(2024, 0, 2, 3, 4, 5)) })
        .all();

      expect(err).toBeNull();
      expect(urlOfCall(0)).toBe(
        `${ROOT}/contacts.json?group=Reporters&deleted=0&after=2024-01-02T03%3A04%3A05.000000Z`,
      );
      expect(initOfCall(0)?.method).toBe('GET');
      expect(contacts).toHaveLength(1);
    });

    it('expect results materialized into typed objects', async () => {
      mockedFetch.mockResolvedValueOnce(json({ results: [ann], next: null }));

      const [, contact] = await client().getContacts({ uuid: 'c-1' }).get();

      expect(contact?.name).toBe('Ann');
      expect(contact?.groups?.[0]?.name).toBe('Reporters');
      expect(contact?.fields).toEqual({ nickname: 'Annie', age: null });
      expect(contact?.flow).toBeUndefined();
      expect(contact?.created_on?.toISOString()).toBe('2024-01-02T03:04:05.123456Z');
      expect(contact?.modified_on?.toISOString()).toBe('2024-01-03T00:00:00.000000Z');
    });

    it('expect the cursor to follow next links', async () => {
      mockedFetch
        .mockResolvedValueOnce(json({ results: [{ uuid: 'l-1', name: 'Spam' }], next: `${ROOT}/labels.json?cursor=b` }))
        .mockResolvedValueOnce(json({ results: [{ uuid: 'l-2', name: 'Ham' }], next: null }));

      const [, labels] = await client().getLabels().all();

      expect(labels?.map((label) => label.name)).toEqual(['Spam', 'Ham']);
      expect(urlOfCall(1)).toBe(`${ROOT}/labels.json?cursor=b`);
    });

    it('expect a saved position to resume iteration', async () => {
      mockedFetch
        .mockResolvedValueOnce(json({ results: [ann], next: `${ROOT}/contacts.json?cursor=2` }))
        .mockResolvedValueOnce(json({ results: [{ ...ann, uuid: 'c-2', name: 'Bob' }], next: null }));
      const api = client();

      const cursor = api.getContacts();
      await cursor.nextPage();
      const position = cursor.position;
      expect(position).not.toBeNull();
      if (!position) {
        return;
      }

      const [, rest] = await api.resume(position, Contact).all();

      expect(rest?.map((contact) => contact.name)).toEqual(['Bob']);
      expect(urlOfCall(1)).toBe(`${ROOT}/contacts.json?cursor=2`);
    });

    it('expect get to report a missing object', async () => {
      mockedFetch.mockResolvedValueOnce(json({ results: [], next: null }));

      const [err] = await client().getFlows({ uuid: 'f-404' }).get();

      expect(err).toBeInstanceOf(NotFoundError);
    });

    it('expect the org read as a single object', async () => {
      mockedFetch.mockResolvedValueOnce(
        json({ uuid: 'o-1', name: 'Nyaruka', country: 'RW', languages: ['eng', 'kin'], anon: false }),
      );

      const [err, org] = await client().getOrg();

      expect(err).toBeNull();
      expect(urlOfCall(0)).toBe(`${ROOT}/org.json`);
      expect(org).toEqual({
        uuid: 'o-1',
        name: 'Nyaruka',
        country: 'RW',
        languages: ['eng', 'kin'],
        primary_language: undefined,
        timezone: undefined,
        date_style: undefined,
        anon: false,
      });
    });

    it('expect definitions requested with repeated flow params', async () => {
      mockedFetch.mockResolvedValueOnce(json({ version: '13', flows: [{ uuid: 'f-1', name: 'Survey' }], groups: [] }));

      const [err, definitions] = await client().getDefinitions({
        flows: [{ uuid: 'f-1' }, 'f-2'],
        dependencies: false,
      });

      expect(err).toBeNull();
      expect(urlOfCall(0)).toBe(`${ROOT}/definitions.json?flow=f-1&flow=f-2&dependencies=0`);
      expect(definitions?.version).toBe('13');
      expect(definitions?.flows).toEqual([{ uuid: 'f-1', name: 'Survey' }]);
    });

    it('expect single reads to re-issue while rate limited when enabled', async () => {
      mockedFetch
        .mockResolvedValueOnce(
          json({ detail: 'Request was throttled.' }, { status: 429, headers: { 'Retry-After': '0' } }),
        )
        .mockResolvedValueOnce(json({ uuid: 'o-1', name: 'Nyaruka' }));

      const [err, org] = await client({ retryOnRateExceed: true }).getOrg();

      expect(err).toBeNull();
      expect(org?.name).toBe('Nyaruka');
      expect(mockedFetch).toHaveBeenCalledTimes(2);
    });

    it('expect debug lines only when debug is on', async () => {
      mockedFetch.mockImplementation(async () => json({ results: [], next: null }));
      const logger = { debug: vi.fn() };

      await client({ logger }).getLabels({ name: 'Spam' }).first();
      expect(logger.debug).not.toHaveBeenCalled();

      await client({ logger, debug: true }).getLabels({ name: 'Spam' }).first();
      expect(logger.debug.mock.calls).toEqual([['GET labels.json?name=Spam'], [' -> 200']]);
    });
  });

  describe('writes', () => {
    it('expect a create to post the payload and materialize the answer', async () => {
      mockedFetch.mockResolvedValueOnce(json(ann, { status: 201 }));

      const [err, contact] = await client().createContact({
        name: 'Ann',
        urns: ['tel:+250788000001'],
        fields: { nickname: 'Annie' },
        groups: [{ uuid: 'g-1' }],
      });

      expect(err).toBeNull();
      expect(contact?.uuid).toBe('c-1');
      expect(urlOfCall(0)).toBe(`${ROOT}/contacts.json`);
      expect(initOfCall(0)?.method).toBe('POST');
      expect(initOfCall(0)?.body).toBe(
        '{"name":"Ann","urns":["tel:+250788000001"],"groups":["g-1"],"fields":{"nickname":"Annie"}}',
      );
    });

    it('expect a contact addressed by URN when the reference contains a colon', async () => {
      mockedFetch.mockImplementation(async () => json(ann));
      const api = client();

      await api.updateContact('tel:+250788000001', { name: 'Ann' });
      await api.updateContact({ uuid: 'c-1' }, { language: 'kin' });

      expect(urlOfCall(0)).toBe(`${ROOT}/contacts.json?urn=tel%3A%2B250788000001`);
      expect(initOfCall(0)?.body).toBe('{"name":"Ann"}');
      expect(urlOfCall(1)).toBe(`${ROOT}/contacts.json?uuid=c-1`);
      expect(initOfCall(1)?.body).toBe('{"language":"kin"}');
    });

    it('expect campaign events posted with the campaign first and the message as JSON', async () => {
      mockedFetch.mockResolvedValueOnce(json({ uuid: 'e-1', offset: 3, unit: 'days' }, { status: 201 }));

      const [err, event] = await client().createCampaignEvent({
        campaign: { uuid: 'cp-1' },
        relative_to: { key: 'joined' },
        offset: 3,
        unit: 'days',
        delivery_hour: -1,
        message: { eng: 'Welcome' },
      });

      expect(err).toBeNull();
      expect(event?.uuid).toBe('e-1');
      expect(JSON.parse(String(initOfCall(0)?.body))).toEqual({
        campaign: 'cp-1',
        relative_to: 'joined',
        offset: 3,
        unit: 'days',
        delivery_hour: -1,
        message: { eng: 'Welcome' },
      });
      expect(Object.keys(JSON.parse(String(initOfCall(0)?.body)))[0]).toBe('campaign');
    });

    it('expect flow start params sent as they are', async () => {
      mockedFetch.mockResolvedValueOnce(json({ uuid: 's-1', params: { source: 'web' } }, { status: 201 }));

      const [, start] = await client().createFlowStart({
        flow: 'f-1',
        contacts: ['c-1'],
        restart_participants: false,
        params: { source: 'web' },
      });

      expect(start?.params).toEqual({ source: 'web' });
      expect(initOfCall(0)?.body).toBe(
        '{"flow":"f-1","contacts":["c-1"],"restart_participants":false,"params":{"source":"web"}}',
      );
    });

    it('expect a validation failure to carry field messages', async () => {
      mockedFetch.mockResolvedValueOnce(json({ urns: ['Invalid URN: tel:abc'] }, { status: 400 }));

      const [err] = await client().createContact({ urns: ['tel:abc'] });

      expect(err).toBeInstanceOf(ValidationError);
      if (err instanceof ValidationError) {
        expect(err.messagesFor('urns')).toEqual(['Invalid URN: tel:abc']);
      }
    });

    it('expect writes never to retry, even when rate-limit retry is enabled', async () => {
      mockedFetch.mockResolvedValueOnce(json({}, { status: 429, headers: { 'Retry-After': '1' } }));

      const [err] = await client({ retryOnRateExceed: true }).createLabel({ name: 'Spam' });

      expect(err).toBeInstanceOf(RateLimitError);
      expect(mockedFetch).toHaveBeenCalledTimes(1);
    });

    it('expect a malformed answer to fail decoding', async () => {
      mockedFetch.mockResolvedValueOnce(json({ uuid: 'l-1' }, { status: 201 }));

      const [err] = await client().createLabel({ name: 'Spam' });

      expect(err).toBeInstanceOf(DecodeError);
      if (err instanceof DecodeError) {
        expect(err.model).toBe('Label');
        expect(err.field).toBe('name');
      }
    });

    it('expect deletes to address the object and return nothing', async () => {
      mockedFetch.mockResolvedValueOnce(new Response(null, { status: 204 }));

      const [err, result] = await client().deleteContact('tel:+250788000001');

      expect(err).toBeNull();
      expect(result).toBeUndefined();
      expect(urlOfCall(0)).toBe(`${ROOT}/contacts.json?urn=tel%3A%2B250788000001`);
      expect(initOfCall(0)?.method).toBe('DELETE');
    });

    it('expect resthook subscribers deleted by id', async () => {
      mockedFetch.mockResolvedValueOnce(new Response(null, { status: 204 }));

      await client().deleteResthookSubscriber({ id: 1001 });

      expect(urlOfCall(0)).toBe(`${ROOT}/resthook_subscribers.json?id=1001`);
    });
  });

  describe('bulk actions', () => {
    it('expect contact actions posted with the action and group', async () => {
      mockedFetch.mockResolvedValueOnce(new Response(null, { status: 204 }));

      const [err] = await client().bulkAddContacts(['c-1', { uuid: 'c-2' }], { uuid: 'g-1' });

      expect(err).toBeNull();
      expect(urlOfCall(0)).toBe(`${ROOT}/contact_actions.json`);
      expect(initOfCall(0)?.body).toBe('{"contacts":["c-1","c-2"],"action":"add","group":"g-1"}');
    });

    it('expect group-less contact actions to omit the group', async () => {
      mockedFetch.mockResolvedValueOnce(new Response(null, { status: 204 }));

      await client().bulkArchiveContactMessages(['tel:+250788000001']);

      expect(initOfCall(0)?.body).toBe('{"contacts":["tel:+250788000001"],"action":"archive_messages"}');
    });

    it('expect messages labelled by label name', async () => {
      mockedFetch.mockResolvedValueOnce(new Response(null, { status: 204 }));

      await client().bulkLabelMessages([101, { id: 102 }], { label_name: 'Important' });

      expect(urlOfCall(0)).toBe(`${ROOT}/message_actions.json`);
      expect(initOfCall(0)?.body).toBe('{"messages":[101,102],"action":"label","label_name":"Important"}');
    });

    it('expect message actions posted with the action', async () => {
      mockedFetch.mockResolvedValueOnce(new Response(null, { status: 204 }));

      await client().bulkRestoreMessages([101]);

      expect(initOfCall(0)?.body).toBe('{"messages":[101],"action":"restore"}');
    });
  });

  describe('dispose', () => {
    it('expect requests after dispose to fail as connection errors', async () => {
      mockedFetch.mockImplementation((_url, init) =>
        init?.signal?.aborted ? Promise.reject(init.signal.reason) : Promise.resolve(json({ results: [] })),
      );
      const api = client();

      api.dispose();
      const [err] = await api.getGroups().first();

      expect(err).toBeInstanceOf(ConnectionError);
    });

    it('expect dispose to cut a rate-limit wait short', async () => {
      mockedFetch.mockImplementation(async () =>
        json({ detail: 'Request was throttled.' }, { status: 429, headers: { 'Retry-After': '60' } }),
      );
      const logger = { debug: vi.fn<(line: string) => void>() };
      const waiting = new Promise<void>((resolve) => {
        logger.debug.mockImplementation((line) => {
          if (line.startsWith('rate limited')) {
            resolve();
          }
        });
      });
      const api = client({ retryOnRateExceed: true, debug: true, logger });

      const pending = api.getGroups().nextPage();
      await waiting;
      api.dispose();
      const [err] = await pending;

      expect(err).toBeInstanceOf(ConnectionError);
      expect(err?.message).toBe('error waiting out rate limit');
      expect(mockedFetch).toHaveBeenCalledTimes(1);
    });
  });
});
