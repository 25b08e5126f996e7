import { z } from 'zod';
import {
  boolean,
  enumeration,
  identifier,
  integer,
  list,
  object,
  record,
  schema,
  string,
  timestamp,
} from '../codec/codecs.js';
import { defineModel, type InferModel, optional, required } from '../model/model.js';
import type { JsonObject, JsonValue } from '../types/json.js';

const jsonValue: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValue), z.record(z.string(), jsonValue)]),
);

const jsonObject: z.ZodType<JsonObject> = z.record(z.string(), jsonValue);

/** GeoJSON coordinates nest to any depth depending on the geometry type. */
type Coordinates = number | Coordinates[];

const coordinates: z.ZodType<Coordinates> = z.lazy(() => z.union([z.number(), z.array(coordinates)]));

/** Reference to another object by UUID. */
export const ObjectRef = defineModel('ObjectRef', {
  uuid: required(identifier()),
  name: optional(string()),
});
export type ObjectRef = InferModel<typeof ObjectRef>;

/** Reference to a contact field by key. */
export const FieldRef = defineModel('FieldRef', {
  key: required(identifier()),
  name: optional(string()),
});
export type FieldRef = InferModel<typeof FieldRef>;

export const Archive = defineModel('Archive', {
  archive_type: required(enumeration(['message', 'run'])),
  start_date: required(timestamp()),
  period: required(enumeration(['daily', 'monthly'])),
  record_count: optional(integer()),
  size: optional(integer()),
  hash: optional(string()),
  download_url: optional(string()),
});
export type Archive = InferModel<typeof Archive>;

export const BoundaryRef = defineModel('BoundaryRef', {
  osm_id: required(identifier()),
  name: optional(string()),
});
export type BoundaryRef = InferModel<typeof BoundaryRef>;

export const Geometry = defineModel('Geometry', {
  type: required(string()),
  coordinates: required(schema(z.array(coordinates))),
});
export type Geometry = InferModel<typeof Geometry>;

/** Administrative boundary; `geometry` is only present when requested. */
export const Boundary = defineModel('Boundary', {
  osm_id: required(identifier()),
  name: required(string()),
  level: required(integer()),
  parent: optional(object(BoundaryRef)),
  aliases: optional(list(string())),
  geometry: optional(object(Geometry)),
});
export type Boundary = InferModel<typeof Boundary>;

export const Broadcast = defineModel('Broadcast', {
  id: required(integer()),
  status: optional(string()),
  urns: optional(list(string())),
  contacts: optional(list(object(ObjectRef))),
  groups: optional(list(object(ObjectRef))),
  text: optional(string()),
  created_on: optional(timestamp()),
});
export type Broadcast = InferModel<typeof Broadcast>;

export const Campaign = defineModel('Campaign', {
  uuid: required(identifier()),
  name: required(string()),
  archived: optional(boolean()),
  group: optional(object(ObjectRef)),
  created_on: optional(timestamp()),
});
export type Campaign = InferModel<typeof Campaign>;

export const CampaignEvent = defineModel('CampaignEvent', {
  uuid: required(identifier()),
  campaign: optional(object(ObjectRef)),
  relative_to: optional(object(FieldRef)),
  offset: optional(integer()),
  unit: optional(string()),
  delivery_hour: optional(integer()),
  flow: optional(object(ObjectRef)),
  message: optional(schema(z.union([z.string(), z.record(z.string(), z.string())]))),
  created_on: optional(timestamp()),
});
export type CampaignEvent = InferModel<typeof CampaignEvent>;

/** Android relayer device a channel runs on. */
export const Device = defineModel('Device', {
  name: optional(string()),
  power_level: optional(integer()),
  power_status: optional(string()),
  power_source: optional(string()),
  network_type: optional(string()),
});
export type Device = InferModel<typeof Device>;

export const Channel = defineModel('Channel', {
  uuid: required(identifier()),
  name: optional(string()),
  address: optional(string()),
  country: optional(string()),
  device: optional(object(Device)),
  last_seen: optional(timestamp()),
  created_on: optional(timestamp()),
});
export type Channel = InferModel<typeof Channel>;

export const Classifier = defineModel('Classifier', {
  uuid: required(identifier()),
  type: optional(string()),
  name: optional(string()),
  intents: optional(list(string())),
  created_on: optional(timestamp()),
});
export type Classifier = InferModel<typeof Classifier>;

/** Contact; `fields` maps field keys to their values, `null` where unset. */
export const Contact = defineModel('Contact', {
  uuid: required(identifier()),
  name: optional(string()),
  status: optional(string()),
  language: optional(string()),
  urns: optional(list(string())),
  groups: optional(list(object(ObjectRef))),
  flow: optional(object(ObjectRef)),
  fields: optional(schema(z.record(z.string(), z.union([z.string(), z.number()]).nullable()))),
  created_on: optional(timestamp()),
  modified_on: optional(timestamp()),
  last_seen_on: optional(timestamp()),
});
export type Contact = InferModel<typeof Contact>;

/** Flow and campaign definitions export. Entries are kept as raw JSON. */
export const Export = defineModel('Export', {
  version: required(string()),
  flows: optional(list(schema(jsonObject))),
  campaigns: optional(list(schema(jsonObject))),
  triggers: optional(list(schema(jsonObject))),
  fields: optional(list(schema(jsonObject))),
  groups: optional(list(schema(jsonObject))),
});
export type Export = InferModel<typeof Export>;

export const Field = defineModel('Field', {
  key: required(identifier()),
  name: optional(string()),
  type: optional(string()),
});
export type Field = InferModel<typeof Field>;

/** Run counts of a flow, by exit state. */
export const FlowRuns = defineModel('FlowRuns', {
  active: optional(integer()),
  waiting: optional(integer()),
  completed: optional(integer()),
  interrupted: optional(integer()),
  expired: optional(integer()),
  failed: optional(integer()),
});
export type FlowRuns = InferModel<typeof FlowRuns>;

export const FlowResult = defineModel('FlowResult', {
  key: required(identifier()),
  name: optional(string()),
  categories: optional(list(string())),
  node_uuids: optional(list(string())),
});
export type FlowResult = InferModel<typeof FlowResult>;

export const Flow = defineModel('Flow', {
  uuid: required(identifier()),
  name: required(string()),
  type: optional(string()),
  archived: optional(boolean()),
  labels: optional(list(object(ObjectRef))),
  expires: optional(integer()),
  created_on: optional(timestamp()),
  runs: optional(object(FlowRuns)),
  results: optional(list(object(FlowResult))),
});
export type Flow = InferModel<typeof Flow>;

export const FlowStart = defineModel('FlowStart', {
  uuid: required(identifier()),
  flow: optional(object(ObjectRef)),
  groups: optional(list(object(ObjectRef))),
  contacts: optional(list(object(ObjectRef))),
  status: optional(string()),
  restart_participants: optional(boolean()),
  exclude_active: optional(boolean()),
  params: optional(schema(jsonObject)),
  created_on: optional(timestamp()),
  modified_on: optional(timestamp()),
});
export type FlowStart = InferModel<typeof FlowStart>;

export const Global = defineModel('Global', {
  key: required(identifier()),
  name: optional(string()),
  value: optional(string()),
  modified_on: optional(timestamp()),
});
export type Global = InferModel<typeof Global>;

export const Group = defineModel('Group', {
  uuid: required(identifier()),
  name: required(string()),
  query: optional(string()),
  status: optional(string()),
  system: optional(boolean()),
  count: optional(integer()),
});
export type Group = InferModel<typeof Group>;

export const Label = defineModel('Label', {
  uuid: required(identifier()),
  name: required(string()),
  count: optional(integer()),
});
export type Label = InferModel<typeof Label>;

export const AttachmentRef = defineModel('AttachmentRef', {
  content_type: required(string()),
  url: required(string()),
});
export type AttachmentRef = InferModel<typeof AttachmentRef>;

export const Message = defineModel('Message', {
  id: required(integer()),
  broadcast: optional(integer()),
  contact: optional(object(ObjectRef)),
  urn: optional(string()),
  channel: optional(object(ObjectRef)),
  direction: optional(enumeration(['in', 'out'])),
  type: optional(string()),
  status: optional(string()),
  visibility: optional(string()),
  text: optional(string()),
  labels: optional(list(object(ObjectRef))),
  attachments: optional(list(object(AttachmentRef))),
  flow: optional(object(ObjectRef)),
  created_on: optional(timestamp()),
  sent_on: optional(timestamp()),
  modified_on: optional(timestamp()),
});
export type Message = InferModel<typeof Message>;

/** Workspace the API token belongs to. */
export const Org = defineModel('Org', {
  uuid: required(identifier()),
  name: required(string()),
  country: optional(string()),
  languages: optional(list(string())),
  primary_language: optional(string()),
  timezone: optional(string()),
  date_style: optional(string()),
  anon: optional(boolean()),
});
export type Org = InferModel<typeof Org>;

export const Resthook = defineModel('Resthook', {
  resthook: required(identifier()),
  created_on: optional(timestamp()),
  modified_on: optional(timestamp()),
});
export type Resthook = InferModel<typeof Resthook>;

export const ResthookEvent = defineModel('ResthookEvent', {
  resthook: required(identifier()),
  data: optional(schema(jsonObject)),
  created_on: optional(timestamp()),
});
export type ResthookEvent = InferModel<typeof ResthookEvent>;

export const ResthookSubscriber = defineModel('ResthookSubscriber', {
  id: required(integer()),
  resthook: optional(string()),
  target_url: optional(string()),
  created_on: optional(timestamp()),
});
export type ResthookSubscriber = InferModel<typeof ResthookSubscriber>;

export const StartRef = defineModel('StartRef', {
  uuid: required(identifier()),
});
export type StartRef = InferModel<typeof StartRef>;

/** Node a run passed through, and when. */
export const Step = defineModel('Step', {
  node: required(identifier()),
  time: required(timestamp()),
});
export type Step = InferModel<typeof Step>;

/** Result collected by a run, keyed by result key in `Run.values`. */
export const RunValue = defineModel('RunValue', {
  name: optional(string()),
  value: optional(string()),
  category: optional(string()),
  node: optional(string()),
  time: optional(timestamp()),
});
export type RunValue = InferModel<typeof RunValue>;

export const Run = defineModel('Run', {
  uuid: required(identifier()),
  flow: optional(object(ObjectRef)),
  contact: optional(object(ObjectRef)),
  start: optional(object(StartRef)),
  responded: optional(boolean()),
  path: optional(list(object(Step))),
  values: optional(record(object(RunValue))),
  created_on: optional(timestamp()),
  modified_on: optional(timestamp()),
  exited_on: optional(timestamp()),
  exit_type: optional(string()),
});
export type Run = InferModel<typeof Run>;
