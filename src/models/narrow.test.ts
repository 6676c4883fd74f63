import { pino } from 'pino';
import { describe, expect, it } from 'vitest';
import { NuclinoClient } from '../core/client.js';
import { ServerError } from '../error/httpError.js';
import { Collection, Item } from './item.js';
import { expectDeleted, expectModel, expectModels, isDeleteResponse, isModel } from './narrow.js';
import { Team } from './team.js';

const client = new NuclinoClient({ apiKey: 'test-key', logger: pino({ level: 'silent' }) });
const item = new Item({ object: 'item', id: 'i1' }, client);
const collection = new Collection({ object: 'collection', id: 'c1' }, client);
const team = new Team({ object: 'team', id: 't1' }, client);

describe('isModel', () => {
  it('matches any of the given tags', () => {
    expect(isModel(item, 'item', 'collection')).toBe(true);
    expect(isModel(collection, 'item', 'collection')).toBe(true);
    expect(isModel(team, 'item', 'collection')).toBe(false);
  });

  it('rejects plain mappings carrying a tag', () => {
    expect(isModel({ object: 'item', id: 'i1', tag: 'item' }, 'item')).toBe(false);
  });
});

describe('expectModel', () => {
  it('passes matching objects through', () => {
    expect(expectModel(item, 'item', 'collection')).toEqual([null, item]);
  });

  it('reports a mismatch as a synthesized server error', () => {
    const [err, model] = expectModel(team, 'item', 'collection');

    expect(model).toBeNull();
    expect(err).toBeInstanceOf(ServerError);
    expect(err?.statusCode).toBe(500);
    expect(err?.message).toBe('Unexpected response data, expected item or collection');
  });
});

describe('expectModels', () => {
  it('accepts lists where every element matches', () => {
    const [err, models] = expectModels([item, collection], 'item', 'collection');

    expect(err).toBeNull();
    expect(models).toEqual([item, collection]);
  });

  it('accepts empty lists', () => {
    expect(expectModels([], 'team')).toEqual([null, []]);
  });

  it('rejects non-lists and lists with a foreign element', () => {
    const [errSingle] = expectModels(team, 'team');
    const [errMixed] = expectModels([team, item], 'team');

    expect(errSingle?.message).toBe('Unexpected response data, expected a list of team');
    expect(errMixed?.message).toBe('Unexpected response data, expected a list of team');
  });
});

describe('expectDeleted', () => {
  it('accepts an id acknowledgement', () => {
    const ack = { id: 'i1' };

    expect(isDeleteResponse(ack)).toBe(true);
    expect(expectDeleted(ack)).toEqual([null, ack]);
  });

  it('rejects domain objects and ids that are not strings', () => {
    expect(isDeleteResponse(item)).toBe(false);
    expect(isDeleteResponse({ id: 1 })).toBe(false);

    const [err] = expectDeleted(item);
    expect(err?.message).toBe('Unexpected response data, expected a delete acknowledgement');
  });
});
