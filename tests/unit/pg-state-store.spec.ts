import type { Pool, QueryResult, QueryResultRow } from 'pg';
import { PgStateStore } from '../../src/adapters/pg-state-store.adapter';
import { StateDocument } from '../../src/documents/state-document';

function createQueryResult<T extends QueryResultRow>(
  rows: T[] = [],
  rowCount?: number,
): QueryResult<T> {
  return {
    rows,
    rowCount: rowCount ?? rows.length,
    command: '',
    oid: 0,
    fields: [],
  };
}

function createMockPool() {
  const query = jest.fn<Promise<QueryResult<QueryResultRow>>, [string, unknown[]?]>();
  const pool = { query } as unknown as Pool;
  return { pool, query };
}

function createDocument(): StateDocument {
  return new StateDocument('orders', {
    id: '00000000-0000-0000-0000-000000000001',
    attributes: { status: 'opened' },
  });
}

describe('PgStateStore', () => {
  describe('persist', () => {
    it('should upsert the document as JSON', async () => {
      const { pool, query } = createMockPool();
      query.mockResolvedValueOnce(createQueryResult([], 1));
      const store = new PgStateStore(pool);
      const doc = createDocument();

      await expect(store.persist(doc, { validate: false })).resolves.toBe(true);

      expect(query).toHaveBeenCalledTimes(1);
      const [sql, params] = query.mock.calls[0];
      expect(sql).toContain('INSERT INTO orders (id, document, updated_at)');
      expect(sql).toContain('ON CONFLICT (id) DO UPDATE SET');
      expect(params).toEqual([
        '00000000-0000-0000-0000-000000000001',
        '{"status":"opened"}',
      ]);
      expect(doc.isNewRecord).toBe(false);
    });

    it('should not query when validation is requested and fails', async () => {
      const { pool, query } = createMockPool();
      const store = new PgStateStore(pool);
      const doc = new StateDocument('orders', {
        validators: [() => 'invalid'],
      });

      await expect(store.persist(doc, { validate: true })).resolves.toBe(false);
      expect(query).not.toHaveBeenCalled();
    });

    it('should map integrity violations to false', async () => {
      const { pool, query } = createMockPool();
      query.mockRejectedValueOnce(
        Object.assign(new Error('duplicate key value'), { code: '23505' }),
      );
      const store = new PgStateStore(pool);
      const doc = createDocument();

      await expect(store.persist(doc, { validate: false })).resolves.toBe(false);
      expect(doc.isNewRecord).toBe(true);
    });

    it('should rethrow other database errors', async () => {
      const { pool, query } = createMockPool();
      query.mockRejectedValueOnce(
        Object.assign(new Error('connection terminated'), { code: '08006' }),
      );
      const store = new PgStateStore(pool);

      await expect(
        store.persist(createDocument(), { validate: false }),
      ).rejects.toThrow('connection terminated');
    });
  });

  describe('findOne', () => {
    it('should return null when no row matches', async () => {
      const { pool, query } = createMockPool();
      query.mockResolvedValueOnce(createQueryResult([]));
      const store = new PgStateStore(pool);

      await expect(store.findOne('orders', 'id-1')).resolves.toBeNull();
    });

    it('should parse string documents', async () => {
      const { pool, query } = createMockPool();
      query.mockResolvedValueOnce(
        createQueryResult([
          {
            id: 'id-1',
            document: '{"status":"opened","total":3}',
            updated_at: '2025-01-01T00:00:00.000Z',
          },
        ]),
      );
      const store = new PgStateStore(pool);

      await expect(store.findOne('orders', 'id-1')).resolves.toEqual({
        id: 'id-1',
        attributes: { status: 'opened', total: 3 },
        updatedAt: new Date('2025-01-01T00:00:00.000Z'),
      });
    });

    it('should reject a stored value that is not an object', async () => {
      const { pool, query } = createMockPool();
      query.mockResolvedValueOnce(
        createQueryResult([
          { id: 'id-1', document: '[1,2]', updated_at: '2025-01-01T00:00:00.000Z' },
        ]),
      );
      const store = new PgStateStore(pool);

      await expect(store.findOne('orders', 'id-1')).rejects.toThrow(
        'Stored document id-1 is not a JSON object',
      );
    });
  });

  it('should query by state field with bound parameters', async () => {
    const { pool, query } = createMockPool();
    query.mockResolvedValueOnce(
      createQueryResult([
        {
          id: 'id-1',
          document: { status: 'opened' },
          updated_at: new Date('2025-01-01T00:00:00.000Z'),
        },
      ]),
    );
    const store = new PgStateStore(pool);

    await expect(
      store.findByState('orders', 'status', 'opened'),
    ).resolves.toEqual([
      {
        id: 'id-1',
        attributes: { status: 'opened' },
        updatedAt: new Date('2025-01-01T00:00:00.000Z'),
      },
    ]);
    expect(query.mock.calls[0][0]).toContain('WHERE document ->> $1 = $2');
    expect(query.mock.calls[0][1]).toEqual(['status', 'opened']);
  });

  it('should reject invalid collection names before querying', async () => {
    const { pool, query } = createMockPool();
    const store = new PgStateStore(pool);

    await expect(store.findOne('orders; DROP TABLE', 'id-1')).rejects.toThrow(
      'Invalid collection name',
    );
    expect(query).not.toHaveBeenCalled();
  });
});
