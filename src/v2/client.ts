import type { NestedModel } from '../codec/codecs.js';
import type { Timestamp } from '../codec/timestamp.js';
import { QueryCursor } from '../core/cursor.js';
import { type Logger, RequestExecutor } from '../core/executor.js';
import { buildPayload, Query, type Reference } from '../core/query.js';
import { executeWithRateLimit } from '../core/rateLimit.js';
import type { ApiError, ClientError } from '../error/types.js';
import { FetchClient } from '../fetch/client.js';
import { apiHeaders, mergeHeaderOptions } from '../fetch/utils.js';
import type { JsonObject } from '../types/json.js';
import type { FetchClientProvider, FetchClientProviderDefinition, HeaderOptions } from '../types/request.js';
import type { SafeWrapAsync } from '../utils/wrap.js';
import { VERSION } from '../version.js';
import {
  Archive,
  Boundary,
  Broadcast,
  Campaign,
  CampaignEvent,
  Channel,
  Classifier,
  Contact,
  Export,
  Field,
  Flow,
  FlowStart,
  Global,
  Group,
  Label,
  Message,
  Org,
  Resthook,
  ResthookEvent,
  ResthookSubscriber,
  Run,
} from './models.js';

/** Settings that can be changed after construction through {@link RapidProClient.config}. */
export interface RapidProClientConfig {
  /** Workspace API token, sent as `Authorization: Token <token>` */
  token?: string;
  /** Names your application in the `User-Agent` header, ahead of this library */
  userAgent?: string;
  /** Extra headers sent with every request; `null` removes a default one. `config` replaces them whole */
  headers?: HeaderOptions;
  /**
   * Per-request timeout in milliseconds, `false` disables.
   * @default 60000
   */
  timeout?: number | false;
  /**
   * Default for cursors and single reads: wait out rate limits and re-issue the request.
   * Writes never retry.
   * @default false
   */
  retryOnRateExceed?: boolean;
  /**
   * Most re-issues of one request while rate-limited; once spent the
   * {@link RateLimitError} is returned.
   * @default Infinity
   */
  rateLimitRetries?: number;
  /**
   * Logs each request, its response status and rate-limit waits.
   * @default false
   */
  debug?: boolean;
  /**
   * Where debug lines go.
   * @default console
   */
  logger?: Logger;
}

/** Configuration for constructing a {@link RapidProClient}, extends {@link RapidProClientConfig}. */
export interface RapidProClientProps extends RapidProClientConfig {
  /**
   * Server hostname such as `rapidpro.io`, which resolves to `https://rapidpro.io/api/v2`.
   * A value starting with `http` is taken as the API root as it is.
   */
  host: string;
  token: string;
  /** HTTP client implementation used for requests. Defaults to {@link FetchClient}. */
  fetchProvider?: FetchClientProvider;
}

/** Per-call options of a paginated or single read. */
export interface QueryOptions {
  /** Overrides the client's {@link RapidProClientConfig.retryOnRateExceed} */
  retryOnRateExceed?: boolean;
  signal?: AbortSignal | null;
}

/** Per-call options of a write. */
export interface RequestOptions {
  signal?: AbortSignal | null;
}

/** Point in time accepted by `before`/`after` filters. */
export type DateInput = Date | Timestamp;

/** An object fetched earlier, or its UUID (a name also works where the API allows it). */
export type ObjectInput = string | Reference;

/** A message fetched earlier, or its id. */
export type MessageId = number | Reference;

/** Filters nothing; for endpoints without filters. */
export type NoFilters = Record<string, never>;

export type ArchiveFilters = {
  type?: 'message' | 'run';
  period?: 'daily' | 'monthly';
  before?: DateInput;
  after?: DateInput;
};

export type BoundaryFilters = {
  /** Include simplified geometry */
  geometry?: boolean;
};

export type BroadcastFilters = {
  id?: number;
  before?: DateInput;
  after?: DateInput;
};

export type UuidFilters = {
  uuid?: string;
};

export type CampaignEventFilters = {
  uuid?: string;
  campaign?: ObjectInput;
};

export type ChannelFilters = {
  uuid?: string;
  address?: string;
};

export type ContactFilters = {
  uuid?: string;
  urn?: string;
  /** Group name or UUID */
  group?: ObjectInput;
  /** Only deleted contacts */
  deleted?: boolean;
  /** Modified before */
  before?: DateInput;
  /** Modified after */
  after?: DateInput;
  /** Oldest first */
  reverse?: boolean;
};

export type DefinitionFilters = {
  flows?: readonly ObjectInput[];
  campaigns?: readonly ObjectInput[];
  /** Include the flows, groups and fields the exported ones depend on */
  dependencies?: boolean;
};

export type FieldFilters = {
  key?: string;
};

export type NamedFilters = {
  uuid?: string;
  name?: string;
};

export type MessageFolder = 'inbox' | 'flows' | 'archived' | 'outbox' | 'incoming' | 'failed' | 'sent';

export type MessageFilters = {
  id?: number;
  folder?: MessageFolder;
  before?: DateInput;
  after?: DateInput;
};

export type ResthookEventFilters = {
  /** Resthook slug */
  resthook?: string;
};

export type ResthookSubscriberFilters = {
  id?: number;
  resthook?: string;
};

export type RunFilters = {
  uuid?: string;
  flow?: ObjectInput;
  contact?: ObjectInput;
  /** Only runs with responses */
  responded?: boolean;
  /** Modified before */
  before?: DateInput;
  /** Modified after */
  after?: DateInput;
  /** Oldest first */
  reverse?: boolean;
  /** Include path data */
  paths?: boolean;
};

export type BroadcastInput = {
  text: string;
  urns?: readonly string[];
  contacts?: readonly ObjectInput[];
  groups?: readonly ObjectInput[];
};

export type CampaignInput = {
  name: string;
  /** Group object, UUID or name */
  group: ObjectInput;
};

export type CampaignEventUnit = 'minutes' | 'hours' | 'days' | 'weeks' | 'months';

export type CampaignEventInput = {
  /** Key of the contact field the event is scheduled from */
  relative_to: string | Reference;
  offset: number;
  unit: CampaignEventUnit;
  /** Hour of day to fire at, `-1` for the same hour as the field value */
  delivery_hour: number;
  /** Message text, or translations by language code */
  message?: string | Readonly<Record<string, string>>;
  flow?: ObjectInput;
};

export type NewCampaignEventInput = CampaignEventInput & {
  /** Campaign object, UUID or name */
  campaign: ObjectInput;
};

/** Contact field values by key; `null` clears a value. */
export type ContactFieldValues = Readonly<Record<string, string | number | null>>;

export type ContactInput = {
  name?: string;
  /** ISO 639-3 code such as `eng` */
  language?: string;
  urns?: readonly string[];
  fields?: ContactFieldValues;
  /** Group objects, UUIDs or names */
  groups?: readonly ObjectInput[];
};

export type FieldType = 'text' | 'number' | 'datetime' | 'state' | 'district' | 'ward';

export type FieldInput = {
  name: string;
  type: FieldType;
};

export type FlowStartInput = {
  flow: ObjectInput;
  urns?: readonly string[];
  contacts?: readonly ObjectInput[];
  groups?: readonly ObjectInput[];
  restart_participants?: boolean;
  exclude_active?: boolean;
  /** Made available to the flow as `@trigger.params` */
  params?: JsonObject;
};

export type MessageInput = {
  contact: ObjectInput;
  text: string;
  attachments?: readonly string[];
};

export type ResthookSubscriberInput = {
  resthook: string;
  target_url: string;
};

/** Existing label, or a label name which is created if needed. */
export type LabelTarget = { label: ObjectInput; label_name?: undefined } | { label?: undefined; label_name: string };

/** Contact actions of `contact_actions` that take no group. */
type ContactAction = 'block' | 'unblock' | 'interrupt' | 'archive_messages' | 'delete';

/** Message actions of `message_actions` that take no label. */
type MessageAction = 'archive' | 'restore' | 'delete';

function rootUrl(host: string): string {
  if (host.startsWith('http')) {
    return host.replace(/\/+$/, '');
  }

  return `https://${host}/api/v2`;
}

/** Contacts are addressed by URN when the reference looks like one. */
function contactParam(contact: ObjectInput): Record<string, ObjectInput> {
  return typeof contact === 'string' && contact.includes(':') ? { urn: contact } : { uuid: contact };
}

/**
 * Typed client for the RapidPro API v2.
 *
 * Reads return a {@link QueryCursor} that fetches lazily, page by page. Single
 * reads and writes issue one request and return error-first tuples via
 * {@link SafeWrapAsync}; writes are never retried.
 *
 * @example
 * const client = new RapidProClient({ host: 'rapidpro.io', token: process.env.RAPIDPRO_TOKEN ?? '' });
 * const [err, contacts] = await client.getContacts({ group: 'Reporters' }).all();
 */
export class RapidProClient {
  /** Transport the executor sends requests through. */
  #transport: FetchClientProviderDefinition;
  /** Issues one request per call and classifies the response. */
  #executor: RequestExecutor;
  /** API root, without trailing slash. */
  #rootUrl: string;
  #token: string;
  #userAgent: string | undefined;
  /** Extra default headers, merged over the API headers. */
  #headers: HeaderOptions | undefined;
  #retryOnRateExceed: boolean;
  #rateLimitRetries: number;
  #debug: boolean;
  #logger: Logger;

  /**
   * Creates a client that wires the transport, executor and rate-limit defaults together.
   *
   * @param props - Host, token and default options.
   */
  constructor({
    host,
    token,
    userAgent,
    headers,
    timeout = 60_000,
    retryOnRateExceed = false,
    rateLimitRetries = Number.POSITIVE_INFINITY,
    debug = false,
    logger = console,
    fetchProvider = FetchClient,
  }: RapidProClientProps) {
    this.#rootUrl = rootUrl(host);
    this.#token = token;
    this.#userAgent = userAgent;
    this.#headers = headers;
    this.#retryOnRateExceed = retryOnRateExceed;
    this.#rateLimitRetries = rateLimitRetries;
    this.#debug = debug;
    this.#logger = logger;

    this.#transport = new fetchProvider(this.#rootUrl, { headers: this.#defaultHeaders() });
    this.#executor = new RequestExecutor(this.#transport, { timeout, logger: this.#activeLogger() });
  }

  /** API root requests are made against, e.g. `https://rapidpro.io/api/v2`. */
  get rootUrl(): string {
    return this.#rootUrl;
  }

  /**
   * Updates credentials, headers and defaults at runtime. Cursors created earlier
   * keep the rate-limit settings they were created with.
   */
  config(opts: RapidProClientConfig) {
    this.#token = opts.token ?? this.#token;
    this.#userAgent = opts.userAgent ?? this.#userAgent;
    this.#headers = opts.headers ?? this.#headers;
    this.#retryOnRateExceed = opts.retryOnRateExceed ?? this.#retryOnRateExceed;
    this.#rateLimitRetries = opts.rateLimitRetries ?? this.#rateLimitRetries;
    this.#debug = opts.debug ?? this.#debug;
    this.#logger = opts.logger ?? this.#logger;

    if (opts.token !== undefined || opts.userAgent !== undefined || opts.headers !== undefined) {
      this.#transport.config({ headers: this.#defaultHeaders() });
    }

    this.#executor.config({ timeout: opts.timeout, logger: this.#activeLogger() });
  }

  /**
   * Aborts in-flight requests and rate-limit waits; they surface as a
   * `ConnectionError`. Requests made afterwards fail the same way.
   */
  dispose() {
    this.#executor.dispose();
  }

  /**
   * Continues iterating from a saved {@link QueryCursor.position}.
   *
   * @param query - Position of an earlier cursor.
   * @param model - Model of the resource the query reads, e.g. `Contact`.
   */
  resume<T>(query: Query, model: NestedModel<T>, opts?: QueryOptions): QueryCursor<T> {
    return this.#cursor(query, model, opts);
  }

  // Paginated reads

  /** Message and run archives. */
  getArchives(filters: ArchiveFilters = {}, opts?: QueryOptions): QueryCursor<Archive> {
    return this.#cursor(Query.of('archives', filters), Archive, opts);
  }

  /** Administrative boundaries of the workspace country. */
  getBoundaries(filters: BoundaryFilters = {}, opts?: QueryOptions): QueryCursor<Boundary> {
    return this.#cursor(Query.of('boundaries', filters), Boundary, opts);
  }

  getBroadcasts(filters: BroadcastFilters = {}, opts?: QueryOptions): QueryCursor<Broadcast> {
    return this.#cursor(Query.of('broadcasts', filters), Broadcast, opts);
  }

  getCampaigns(filters: UuidFilters = {}, opts?: QueryOptions): QueryCursor<Campaign> {
    return this.#cursor(Query.of('campaigns', filters), Campaign, opts);
  }

  getCampaignEvents(filters: CampaignEventFilters = {}, opts?: QueryOptions): QueryCursor<CampaignEvent> {
    return this.#cursor(Query.of('campaign_events', filters), CampaignEvent, opts);
  }

  getChannels(filters: ChannelFilters = {}, opts?: QueryOptions): QueryCursor<Channel> {
    return this.#cursor(Query.of('channels', filters), Channel, opts);
  }

  /** NLU classifiers. */
  getClassifiers(filters: UuidFilters = {}, opts?: QueryOptions): QueryCursor<Classifier> {
    return this.#cursor(Query.of('classifiers', filters), Classifier, opts);
  }

  /** Contacts, most recently modified first unless `reverse` is set. */
  getContacts(filters: ContactFilters = {}, opts?: QueryOptions): QueryCursor<Contact> {
    return this.#cursor(Query.of('contacts', filters), Contact, opts);
  }

  getFields(filters: FieldFilters = {}, opts?: QueryOptions): QueryCursor<Field> {
    return this.#cursor(Query.of('fields', filters), Field, opts);
  }

  getFlows(filters: UuidFilters = {}, opts?: QueryOptions): QueryCursor<Flow> {
    return this.#cursor(Query.of('flows', filters), Flow, opts);
  }

  getFlowStarts(filters: UuidFilters = {}, opts?: QueryOptions): QueryCursor<FlowStart> {
    return this.#cursor(Query.of('flow_starts', filters), FlowStart, opts);
  }

  getGlobals(filters: NoFilters = {}, opts?: QueryOptions): QueryCursor<Global> {
    return this.#cursor(Query.of('globals', filters), Global, opts);
  }

  getGroups(filters: NamedFilters = {}, opts?: QueryOptions): QueryCursor<Group> {
    return this.#cursor(Query.of('groups', filters), Group, opts);
  }

  getLabels(filters: NamedFilters = {}, opts?: QueryOptions): QueryCursor<Label> {
    return this.#cursor(Query.of('labels', filters), Label, opts);
  }

  getMessages(filters: MessageFilters = {}, opts?: QueryOptions): QueryCursor<Message> {
    return this.#cursor(Query.of('messages', filters), Message, opts);
  }

  getResthooks(filters: NoFilters = {}, opts?: QueryOptions): QueryCursor<Resthook> {
    return this.#cursor(Query.of('resthooks', filters), Resthook, opts);
  }

  getResthookEvents(filters: ResthookEventFilters = {}, opts?: QueryOptions): QueryCursor<ResthookEvent> {
    return this.#cursor(Query.of('resthook_events', filters), ResthookEvent, opts);
  }

  getResthookSubscribers(
    filters: ResthookSubscriberFilters = {},
    opts?: QueryOptions,
  ): QueryCursor<ResthookSubscriber> {
    return this.#cursor(Query.of('resthook_subscribers', filters), ResthookSubscriber, opts);
  }

  /** Flow runs, most recently modified first unless `reverse` is set. */
  getRuns(filters: RunFilters = {}, opts?: QueryOptions): QueryCursor<Run> {
    return this.#cursor(Query.of('runs', filters), Run, opts);
  }

  // Single reads

  /** The workspace the token belongs to. */
  getOrg(opts?: QueryOptions): SafeWrapAsync<ClientError, Org> {
    return this.#read(Query.of('org'), Org, opts);
  }

  /** Export of flow and campaign definitions. */
  getDefinitions(
    { flows, campaigns, dependencies }: DefinitionFilters = {},
    opts?: QueryOptions,
  ): SafeWrapAsync<ClientError, Export> {
    const query = Query.of('definitions', { flow: flows, campaign: campaigns, dependencies });
    return this.#read(query, Export, opts);
  }

  // Creates

  /** Creates and sends a broadcast to URNs, contacts or groups. */
  createBroadcast(input: BroadcastInput, opts?: RequestOptions): SafeWrapAsync<ClientError, Broadcast> {
    return this.#save(Query.of('broadcasts'), buildPayload(input), Broadcast, opts);
  }

  createCampaign(input: CampaignInput, opts?: RequestOptions): SafeWrapAsync<ClientError, Campaign> {
    return this.#save(Query.of('campaigns'), buildPayload(input), Campaign, opts);
  }

  createCampaignEvent(
    { campaign, ...input }: NewCampaignEventInput,
    opts?: RequestOptions,
  ): SafeWrapAsync<ClientError, CampaignEvent> {
    return this.#save(Query.of('campaign_events'), campaignEventPayload(input, campaign), CampaignEvent, opts);
  }

  createContact(input: ContactInput, opts?: RequestOptions): SafeWrapAsync<ClientError, Contact> {
    return this.#save(Query.of('contacts'), contactPayload(input), Contact, opts);
  }

  createField(input: FieldInput, opts?: RequestOptions): SafeWrapAsync<ClientError, Field> {
    return this.#save(Query.of('fields'), buildPayload(input), Field, opts);
  }

  /** Starts contacts down a flow. */
  createFlowStart({ params, ...input }: FlowStartInput, opts?: RequestOptions): SafeWrapAsync<ClientError, FlowStart> {
    return this.#save(Query.of('flow_starts'), buildPayload(input, { params }), FlowStart, opts);
  }

  createGlobal(input: { name: string; value: string }, opts?: RequestOptions): SafeWrapAsync<ClientError, Global> {
    return this.#save(Query.of('globals'), buildPayload(input), Global, opts);
  }

  createGroup(input: { name: string }, opts?: RequestOptions): SafeWrapAsync<ClientError, Group> {
    return this.#save(Query.of('groups'), buildPayload(input), Group, opts);
  }

  createLabel(input: { name: string }, opts?: RequestOptions): SafeWrapAsync<ClientError, Label> {
    return this.#save(Query.of('labels'), buildPayload(input), Label, opts);
  }

  /** Sends a message to one contact. */
  createMessage(input: MessageInput, opts?: RequestOptions): SafeWrapAsync<ClientError, Message> {
    return this.#save(Query.of('messages'), buildPayload(input), Message, opts);
  }

  createResthookSubscriber(
    input: ResthookSubscriberInput,
    opts?: RequestOptions,
  ): SafeWrapAsync<ClientError, ResthookSubscriber> {
    return this.#save(Query.of('resthook_subscribers'), buildPayload(input), ResthookSubscriber, opts);
  }

  // Updates

  updateCampaign(
    campaign: ObjectInput,
    input: CampaignInput,
    opts?: RequestOptions,
  ): SafeWrapAsync<ClientError, Campaign> {
    return this.#save(Query.of('campaigns', { uuid: campaign }), buildPayload(input), Campaign, opts);
  }

  updateCampaignEvent(
    event: ObjectInput,
    input: CampaignEventInput,
    opts?: RequestOptions,
  ): SafeWrapAsync<ClientError, CampaignEvent> {
    const query = Query.of('campaign_events', { uuid: event });
    return this.#save(query, campaignEventPayload(input), CampaignEvent, opts);
  }

  /**
   * Updates a contact addressed by object, UUID or URN (any string containing `:`).
   * Fields left out of `input` are not changed.
   */
  updateContact(contact: ObjectInput, input: ContactInput, opts?: RequestOptions): SafeWrapAsync<ClientError, Contact> {
    return this.#save(Query.of('contacts', contactParam(contact)), contactPayload(input), Contact, opts);
  }

  /** Updates a contact field addressed by object or key. */
  updateField(field: string | Reference, input: FieldInput, opts?: RequestOptions): SafeWrapAsync<ClientError, Field> {
    return this.#save(Query.of('fields', { key: field }), buildPayload(input), Field, opts);
  }

  /** Updates a global addressed by object or key. */
  updateGlobal(
    global: string | Reference,
    input: { value: string },
    opts?: RequestOptions,
  ): SafeWrapAsync<ClientError, Global> {
    return this.#save(Query.of('globals', { key: global }), buildPayload(input), Global, opts);
  }

  updateGroup(group: ObjectInput, input: { name: string }, opts?: RequestOptions): SafeWrapAsync<ClientError, Group> {
    return this.#save(Query.of('groups', { uuid: group }), buildPayload(input), Group, opts);
  }

  updateLabel(label: ObjectInput, input: { name: string }, opts?: RequestOptions): SafeWrapAsync<ClientError, Label> {
    return this.#save(Query.of('labels', { uuid: label }), buildPayload(input), Label, opts);
  }

  // Deletes

  deleteCampaignEvent(event: ObjectInput, opts?: RequestOptions): SafeWrapAsync<ApiError, void> {
    return this.#send('DELETE', Query.of('campaign_events', { uuid: event }), undefined, opts);
  }

  /** Deletes a contact addressed by object, UUID or URN. */
  deleteContact(contact: ObjectInput, opts?: RequestOptions): SafeWrapAsync<ApiError, void> {
    return this.#send('DELETE', Query.of('contacts', contactParam(contact)), undefined, opts);
  }

  deleteGroup(group: ObjectInput, opts?: RequestOptions): SafeWrapAsync<ApiError, void> {
    return this.#send('DELETE', Query.of('groups', { uuid: group }), undefined, opts);
  }

  deleteLabel(label: ObjectInput, opts?: RequestOptions): SafeWrapAsync<ApiError, void> {
    return this.#send('DELETE', Query.of('labels', { uuid: label }), undefined, opts);
  }

  /** Deletes a resthook subscriber addressed by object or id. */
  deleteResthookSubscriber(subscriber: number | Reference, opts?: RequestOptions): SafeWrapAsync<ApiError, void> {
    return this.#send('DELETE', Query.of('resthook_subscribers', { id: subscriber }), undefined, opts);
  }

  // Bulk actions

  /** Adds contacts (objects, UUIDs or URNs) to a group. */
  bulkAddContacts(
    contacts: readonly ObjectInput[],
    group: ObjectInput,
    opts?: RequestOptions,
  ): SafeWrapAsync<ApiError, void> {
    return this.#contactAction('add', contacts, group, opts);
  }

  /** Removes contacts (objects, UUIDs or URNs) from a group. */
  bulkRemoveContacts(
    contacts: readonly ObjectInput[],
    group: ObjectInput,
    opts?: RequestOptions,
  ): SafeWrapAsync<ApiError, void> {
    return this.#contactAction('remove', contacts, group, opts);
  }

  bulkBlockContacts(contacts: readonly ObjectInput[], opts?: RequestOptions): SafeWrapAsync<ApiError, void> {
    return this.#contactAction('block', contacts, undefined, opts);
  }

  bulkUnblockContacts(contacts: readonly ObjectInput[], opts?: RequestOptions): SafeWrapAsync<ApiError, void> {
    return this.#contactAction('unblock', contacts, undefined, opts);
  }

  /** Interrupts the active flow runs of contacts. */
  bulkInterruptContacts(contacts: readonly ObjectInput[], opts?: RequestOptions): SafeWrapAsync<ApiError, void> {
    return this.#contactAction('interrupt', contacts, undefined, opts);
  }

  /** Archives every message of the contacts. */
  bulkArchiveContactMessages(contacts: readonly ObjectInput[], opts?: RequestOptions): SafeWrapAsync<ApiError, void> {
    return this.#contactAction('archive_messages', contacts, undefined, opts);
  }

  bulkDeleteContacts(contacts: readonly ObjectInput[], opts?: RequestOptions): SafeWrapAsync<ApiError, void> {
    return this.#contactAction('delete', contacts, undefined, opts);
  }

  /** Labels messages with an existing label, or one created from `label_name`. */
  bulkLabelMessages(
    messages: readonly MessageId[],
    target: LabelTarget,
    opts?: RequestOptions,
  ): SafeWrapAsync<ApiError, void> {
    const payload = buildPayload({ messages, action: 'label', label: target.label, label_name: target.label_name });
    return this.#send('POST', Query.of('message_actions'), payload, opts);
  }

  /** Removes a label from messages; an unknown `label_name` is ignored. */
  bulkUnlabelMessages(
    messages: readonly MessageId[],
    target: LabelTarget,
    opts?: RequestOptions,
  ): SafeWrapAsync<ApiError, void> {
    const payload = buildPayload({ messages, action: 'unlabel', label: target.label, label_name: target.label_name });
    return this.#send('POST', Query.of('message_actions'), payload, opts);
  }

  bulkArchiveMessages(messages: readonly MessageId[], opts?: RequestOptions): SafeWrapAsync<ApiError, void> {
    return this.#messageAction('archive', messages, opts);
  }

  /** Restores archived messages. */
  bulkRestoreMessages(messages: readonly MessageId[], opts?: RequestOptions): SafeWrapAsync<ApiError, void> {
    return this.#messageAction('restore', messages, opts);
  }

  bulkDeleteMessages(messages: readonly MessageId[], opts?: RequestOptions): SafeWrapAsync<ApiError, void> {
    return this.#messageAction('delete', messages, opts);
  }

  #defaultHeaders(): Headers {
    const userAgent = this.#userAgent ? `${this.#userAgent} rapidpro-client/${VERSION}` : `rapidpro-client/${VERSION}`;
    return mergeHeaderOptions(apiHeaders(this.#token, userAgent), this.#headers);
  }

  #activeLogger(): Logger | null {
    return this.#debug ? this.#logger : null;
  }

  #cursor<T>(query: Query, model: NestedModel<T>, opts: QueryOptions = {}): QueryCursor<T> {
    return new QueryCursor(this.#executor, query, model, {
      retryOnRateExceed: opts.retryOnRateExceed ?? this.#retryOnRateExceed,
      rateLimitRetries: this.#rateLimitRetries,
      signal: opts.signal,
      logger: this.#activeLogger(),
    });
  }

  /** GET of one bare object, waiting out rate limits like a cursor would. */
  async #read<T>(query: Query, model: NestedModel<T>, opts: QueryOptions = {}): SafeWrapAsync<ClientError, T> {
    const [err, page] = await executeWithRateLimit(
      this.#executor,
      query,
      { method: 'GET', envelope: 'object', signal: opts.signal },
      {
        retryOnRateExceed: opts.retryOnRateExceed ?? this.#retryOnRateExceed,
        rateLimitRetries: this.#rateLimitRetries,
        logger: this.#activeLogger(),
      },
    );
    if (err) {
      return [err, null];
    }

    return model.materialize(page.results[0]);
  }

  /** POST that answers with the saved object. Sent once. */
  async #save<T>(
    query: Query,
    body: JsonObject,
    model: NestedModel<T>,
    opts: RequestOptions = {},
  ): SafeWrapAsync<ClientError, T> {
    const [err, page] = await this.#executor.execute(query, {
      method: 'POST',
      envelope: 'object',
      body,
      signal: opts.signal,
    });
    if (err) {
      return [err, null];
    }

    return model.materialize(page.results[0]);
  }

  /** Write whose response body is ignored. Sent once. */
  async #send(
    method: 'POST' | 'DELETE',
    query: Query,
    body: JsonObject | undefined,
    opts: RequestOptions = {},
  ): SafeWrapAsync<ApiError, void> {
    const [err] = await this.#executor.execute(query, { method, envelope: 'none', body, signal: opts.signal });
    if (err) {
      return [err, null];
    }

    return [null, undefined];
  }

  #contactAction(
    action: ContactAction | 'add' | 'remove',
    contacts: readonly ObjectInput[],
    group: ObjectInput | undefined,
    opts?: RequestOptions,
  ): SafeWrapAsync<ApiError, void> {
    return this.#send('POST', Query.of('contact_actions'), buildPayload({ contacts, action, group }), opts);
  }

  #messageAction(
    action: MessageAction,
    messages: readonly MessageId[],
    opts?: RequestOptions,
  ): SafeWrapAsync<ApiError, void> {
    return this.#send('POST', Query.of('message_actions'), buildPayload({ messages, action }), opts);
  }
}

function contactPayload({ fields, ...input }: ContactInput): JsonObject {
  return buildPayload(input, { fields });
}

function campaignEventPayload({ message, ...input }: CampaignEventInput, campaign?: ObjectInput): JsonObject {
  return buildPayload({ campaign, ...input }, { message });
}
