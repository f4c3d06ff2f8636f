import type { StoredDocument } from '../../src/interfaces/state-store.interface';
import {
  collectMemberNames,
  defineStateScopes,
} from '../../src/utils/define-state-scopes';

const openedDoc: StoredDocument = {
  id: 'id-1',
  attributes: { status: 'opened' },
  updatedAt: new Date('2025-01-01T00:00:00.000Z'),
};

describe('defineStateScopes', () => {
  it('should define one finder per state that queries by state value', async () => {
    const query = jest.fn(async (state: string) =>
      state === 'opened' ? [openedDoc] : [],
    );

    const scopes = defineStateScopes(['pending', 'opened'], query);

    expect(Object.keys(scopes)).toEqual(['pending', 'opened']);
    await expect(scopes.opened()).resolves.toEqual([openedDoc]);
    await expect(scopes.pending()).resolves.toEqual([]);
    expect(query).toHaveBeenNthCalledWith(1, 'opened');
    expect(query).toHaveBeenNthCalledWith(2, 'pending');
  });

  it('should skip states whose name is reserved', () => {
    const query = jest.fn(async () => []);

    const scopes = defineStateScopes(['name', 'opened'], query, new Set(['name']));

    expect(Object.keys(scopes)).toEqual(['opened']);
  });

  it('should define a scope once for a repeated state', () => {
    const scopes = defineStateScopes(['opened', 'opened'], async () => []);

    expect(Object.keys(scopes)).toEqual(['opened']);
  });

  it('should not treat inherited object keys as taken', () => {
    const scopes = defineStateScopes(['constructor'], async () => []);

    expect(Object.keys(scopes)).toEqual(['constructor']);
  });
});

describe('collectMemberNames', () => {
  class Base {
    static findAll(): void {}
  }
  class Ticket extends Base {
    static opened(): void {}
  }

  it('should collect own and inherited static members', () => {
    const names = collectMemberNames(Ticket);

    expect(names.has('opened')).toBe(true);
    expect(names.has('findAll')).toBe(true);
    expect(names.has('name')).toBe(true);
    expect(names.has('bind')).toBe(true);
    expect(names.has('closed')).toBe(false);
  });
});
