import { describe, expect, it } from 'vitest';
import { identifier, integer, list, object, string, timestamp } from '../codec/codecs.js';
import { Timestamp } from '../codec/timestamp.js';
import { defineModel, type InferModel, optional, required } from './model.js';

const Ref = defineModel('ObjectRef', {
  uuid: required(identifier()),
  name: optional(string()),
});

const Person = defineModel('Person', {
  uuid: required(identifier()),
  name: optional(string()),
  groups: required(list(object(Ref))),
  age: optional(integer()),
  created_on: required(timestamp()),
});

type Person = InferModel<typeof Person>;

const raw = {
  uuid: 'p-1',
  name: 'Ann',
  groups: [
    { uuid: 'g-2', name: 'Staff' },
    { uuid: 'g-1', name: 'Donors' },
  ],
  age: 33,
  created_on: '2024-01-15T10:30:00.123456Z',
};

describe('defineModel', () => {
  it('exposes frozen fields in declaration order', () => {
    expect(Person.name).toBe('Person');
    expect(Person.fields.map((field) => [field.name, field.required])).toEqual([
      ['uuid', true],
      ['name', false],
      ['groups', true],
      ['age', false],
      ['created_on', true],
    ]);
    expect(Object.isFrozen(Person.fields)).toBe(true);
    expect(Object.isFrozen(Person.fields[0])).toBe(true);
  });
});

describe('materialize', () => {
  it('decodes every field and preserves list order', () => {
    const [err, person] = Person.materialize(raw);

    expect(err).toBeNull();
    expect(person?.uuid).toBe('p-1');
    expect(person?.groups.map((group) => group.uuid)).toEqual(['g-2', 'g-1']);
    expect(person?.created_on).toBeInstanceOf(Timestamp);
    expect(Object.isFrozen(person)).toBe(true);
    expect(Object.isFrozen(person?.groups)).toBe(true);
  });

  it('maps missing and null optionals to absent', () => {
    const [err, person] = Person.materialize({ ...raw, name: null, age: undefined });

    expect(err).toBeNull();
    expect(person?.name).toBeUndefined();
    expect(person?.age).toBeUndefined();
    expect(person && 'name' in person).toBe(true);
  });

  it('names the missing required field', () => {
    const { uuid: _uuid, ...withoutUuid } = raw;
    const [err, person] = Person.materialize(withoutUuid);

    expect(person).toBeNull();
    expect(err?.field).toBe('uuid');
    expect(err?.model).toBe('Person');
    expect(err?.message).toBe(`error decoding Person field 'uuid': required field missing, got nothing`);
  });

  it('fails on null required fields', () => {
    const [err] = Person.materialize({ ...raw, created_on: null });

    expect(err?.reason).toBe('required field is null');
    expect(err?.field).toBe('created_on');
  });

  it('reports nested failures with a path and the raw value', () => {
    const [err] = Person.materialize({ ...raw, groups: [{ uuid: 'g-2' }, { uuid: '' }] });

    expect(err?.field).toBe('groups[1].uuid');
    expect(err?.value).toBe('');
    expect(err?.model).toBe('Person');
  });

  it('fails fast on the first bad field in declaration order', () => {
    const [err] = Person.materialize({ ...raw, age: 'old', created_on: 'never' });

    expect(err?.field).toBe('age');
  });

  it('ignores unknown keys', () => {
    const [err, person] = Person.materialize({ ...raw, shiny_new_field: true });

    expect(err).toBeNull();
    expect(person && 'shiny_new_field' in person).toBe(false);
  });

  it('rejects non-objects', () => {
    expect(Person.materialize([raw])[0]?.reason).toBe('expected object');
    expect(Person.materialize(null)[0]?.reason).toBe('expected object');
  });
});

describe('serialize', () => {
  it('reproduces canonical raw values for present fields', () => {
    const [, person] = Person.materialize(raw);
    if (!person) {
      throw new Error('expected person');
    }

    expect(Person.serialize(person)).toEqual(raw);
  });

  it('omits absent optionals', () => {
    const person: Person = {
      uuid: 'p-2',
      groups: [],
      created_on: Timestamp.fromEpochMicros(0),
    };

    expect(Person.serialize(person)).toEqual({
      uuid: 'p-2',
      groups: [],
      created_on: '1970-01-01T00:00:00.000000Z',
    });
  });
});

describe('standard schema', () => {
  it('validates through the ~standard interface', () => {
    const ok = Ref['~standard'].validate({ uuid: 'g-1' });
    const bad = Ref['~standard'].validate({ name: 'x' });

    expect(ok).toEqual({ value: { uuid: 'g-1', name: undefined } });
    expect(bad).toEqual({
      issues: [
        {
          message: `error decoding ObjectRef field 'uuid': required field missing, got nothing`,
          path: ['uuid'],
        },
      ],
    });
    expect(Ref['~standard'].vendor).toBe('rapidpro-client');
  });
});
