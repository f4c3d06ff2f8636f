import {
  PrismaRawExecutor,
  PrismaStateStore,
} from '../../src/adapters/prisma-state-store.adapter';
import { StateDocument } from '../../src/documents/state-document';

function createMockPrismaClient() {
  const queryRawUnsafe = jest.fn().mockResolvedValue([]);
  const executeRawUnsafe = jest.fn().mockResolvedValue(1);
  const client: PrismaRawExecutor = {
    $queryRawUnsafe: queryRawUnsafe,
    $executeRawUnsafe: executeRawUnsafe,
  };
  return { client, queryRawUnsafe, executeRawUnsafe };
}

describe('PrismaStateStore', () => {
  it('should upsert the document through $executeRawUnsafe', async () => {
    const { client, executeRawUnsafe } = createMockPrismaClient();
    const store = new PrismaStateStore(client);
    const doc = new StateDocument('orders', {
      id: 'id-1',
      attributes: { status: 'opened' },
    });

    await expect(store.persist(doc, { validate: false })).resolves.toBe(true);

    const [query, ...values] = executeRawUnsafe.mock.calls[0];
    expect(query).toContain('INSERT INTO orders (id, document, updated_at)');
    expect(values).toEqual(['id-1', '{"status":"opened"}']);
  });

  it('should report a save that affected no rows as refused', async () => {
    const { client, executeRawUnsafe } = createMockPrismaClient();
    executeRawUnsafe.mockResolvedValueOnce(0);
    const store = new PrismaStateStore(client);

    await expect(
      store.persist(new StateDocument('orders'), { validate: false }),
    ).resolves.toBe(false);
  });

  it.each([
    ['P2002', {}],
    ['P2010', { code: '23505' }],
  ])('should map constraint failure %s to false', async (code, meta) => {
    const { client, executeRawUnsafe } = createMockPrismaClient();
    executeRawUnsafe.mockRejectedValueOnce(
      Object.assign(new Error('constraint failed'), { code, meta }),
    );
    const store = new PrismaStateStore(client);

    await expect(
      store.persist(new StateDocument('orders'), { validate: false }),
    ).resolves.toBe(false);
  });

  it('should rethrow unrelated Prisma errors', async () => {
    const { client, executeRawUnsafe } = createMockPrismaClient();
    executeRawUnsafe.mockRejectedValueOnce(
      Object.assign(new Error("Can't reach database server"), { code: 'P1001' }),
    );
    const store = new PrismaStateStore(client);

    await expect(
      store.persist(new StateDocument('orders'), { validate: false }),
    ).rejects.toThrow("Can't reach database server");
  });

  it('should map findOne rows', async () => {
    const { client, queryRawUnsafe } = createMockPrismaClient();
    queryRawUnsafe.mockResolvedValueOnce([
      {
        id: 'id-1',
        document: { status: 'opened' },
        updated_at: new Date('2025-01-01T00:00:00.000Z'),
      },
    ]);
    const store = new PrismaStateStore(client);

    await expect(store.findOne('orders', 'id-1')).resolves.toEqual({
      id: 'id-1',
      attributes: { status: 'opened' },
      updatedAt: new Date('2025-01-01T00:00:00.000Z'),
    });
    expect(queryRawUnsafe).toHaveBeenCalledWith(
      'SELECT id, document, updated_at FROM orders WHERE id = $1::uuid',
      'id-1',
    );
  });

  it('should pass state field and value to findByState', async () => {
    const { client, queryRawUnsafe } = createMockPrismaClient();
    const store = new PrismaStateStore(client);

    await expect(
      store.findByState('orders', 'status', 'opened'),
    ).resolves.toEqual([]);
    expect(queryRawUnsafe).toHaveBeenCalledWith(
      'SELECT id, document, updated_at FROM orders WHERE document ->> $1 = $2',
      'status',
      'opened',
    );
  });

  it('should reject invalid collection name in method calls', async () => {
    const { client, queryRawUnsafe } = createMockPrismaClient();
    const store = new PrismaStateStore(client);

    await expect(store.findOne('orders; DROP TABLE', 'id-1')).rejects.toThrow(
      'Invalid collection name',
    );
    expect(queryRawUnsafe).not.toHaveBeenCalled();
  });
});
