import { MemoryDataStore } from '../../src/store/memoryStore';
import { ReviewService } from '../../src/services/reviewService';
import { toActor } from '../../src/services/actor';
import { addProduct, addUser } from '../helpers/fixtures';

describe('MemoryDataStore', () => {
  let store: MemoryDataStore;

  beforeEach(() => {
    store = new MemoryDataStore();
  });

  it('should commit writes made inside a transaction', async () => {
    const product = await addProduct(store);

    await store.transaction((tx) => tx.products.setRating(product.id, 4.2, 5));

    expect((await store.products.findById(product.id))?.rating).toBe(4.2);
  });

  it('should discard every write of a transaction that throws', async () => {
    const product = await addProduct(store);

    await expect(
      store.transaction(async (tx) => {
        await tx.reviews.insert({ author: 'u1', product: product.id, grade: 5, submittedOn: '2026-02-01' });
        await tx.products.setRating(product.id, 5, 1);
        throw new Error('abort');
      })
    ).rejects.toThrow('abort');

    expect(await store.reviews.listActive()).toEqual([]);
    expect((await store.products.findById(product.id))?.rating).toBe(0);
  });

  it('should hide uncommitted writes from readers outside the transaction', async () => {
    const product = await addProduct(store);
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    let inserted: () => void = () => undefined;
    const insertDone = new Promise<void>((resolve) => {
      inserted = resolve;
    });

    const pending = store.transaction(async (tx) => {
      await tx.reviews.insert({ author: 'u1', product: product.id, grade: 3, submittedOn: '2026-02-01' });
      inserted();
      await gate;
    });

    await insertDone;
    expect(await store.reviews.listActive()).toEqual([]);

    release();
    await pending;
    expect(await store.reviews.listActive()).toHaveLength(1);
  });

  it('should run transactions one after another', async () => {
    const product = await addProduct(store);
    const order: string[] = [];

    await Promise.all([
      store.transaction(async (tx) => {
        order.push('first:start');
        await new Promise((resolve) => setTimeout(resolve, 10));
        await tx.products.setRating(product.id, 1, 1);
        order.push('first:end');
      }),
      store.transaction(async (tx) => {
        order.push('second:start');
        const seen = await tx.products.findById(product.id);
        await tx.products.setRating(product.id, (seen?.rating ?? 0) + 1, 2);
        order.push('second:end');
      }),
    ]);

    expect(order).toEqual(['first:start', 'first:end', 'second:start', 'second:end']);
    expect((await store.products.findById(product.id))?.rating).toBe(2);
  });

  it('should keep running transactions after one fails', async () => {
    const product = await addProduct(store);

    const failed = store.transaction(async () => {
      throw new Error('boom');
    });
    const next = store.transaction((tx) => tx.products.setRating(product.id, 3, 1));

    await expect(failed).rejects.toThrow('boom');
    await next;
    expect((await store.products.findById(product.id))?.rating).toBe(3);
  });

  it('should find products by slug case-insensitively', async () => {
    const product = await addProduct(store, 'waffle-robe');

    expect(await store.products.findBySlug('Waffle-Robe')).toEqual(product);
  });

  it('should keep a user registered while a review submit is in flight', async () => {
    await addProduct(store);
    const customer = toActor(await addUser(store, 'customer', 'Casey', 'Customer'));
    const service = new ReviewService(store);

    const submitting = service.submitReview(customer, 'linen-bath-towel', 4);
    const registering = addUser(store, 'customer', 'Robin', 'Reviewer');
    const [, robin] = await Promise.all([submitting, registering]);

    expect(await store.users.findById(robin.id)).toEqual(robin);
    expect(await store.reviews.listActive()).toHaveLength(1);
  });

  it('should keep a product added while a review submit is in flight', async () => {
    await addProduct(store);
    const customer = toActor(await addUser(store, 'customer', 'Casey', 'Customer'));
    const service = new ReviewService(store);

    const submitting = service.submitReview(customer, 'linen-bath-towel', 5);
    const adding = addProduct(store, 'waffle-robe');
    await Promise.all([submitting, adding]);

    expect(await store.products.findBySlug('waffle-robe')).not.toBeNull();
    expect((await store.products.findBySlug('linen-bath-towel'))?.rating).toBe(5);
  });

  it('should queue a direct write behind a running transaction', async () => {
    const product = await addProduct(store);
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const pending = store.transaction(async (tx) => {
      await gate;
      await tx.products.setRating(product.id, 2, 1);
    });
    const direct = store.products.upsert({ slug: 'waffle-robe', name: 'Waffle Robe', isActive: true });

    release();
    await Promise.all([pending, direct]);

    expect(await store.products.findBySlug('waffle-robe')).not.toBeNull();
    expect((await store.products.findById(product.id))?.rating).toBe(2);
  });
});
