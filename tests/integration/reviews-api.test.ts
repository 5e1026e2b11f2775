import request from 'supertest';
import { Express } from 'express';
import { createApp } from '../../src/app';
import { MemoryDataStore } from '../../src/store/memoryStore';
import { Product, UserRecord } from '../../src/store/types';
import { generateToken } from '../../src/utils/generateToken';
import { addProduct, addUser, TEST_SECRET } from '../helpers/fixtures';

describe('Reviews API', () => {
  let store: MemoryDataStore;
  let app: Express;
  let product: Product;
  let customer: UserRecord;
  let customerToken: string;
  let adminToken: string;

  const submit = (grade: unknown, comment?: string, token = customerToken) =>
    request(app)
      .post(`/api/products/${product.slug}/reviews`)
      .set('Authorization', `Bearer ${token}`)
      .send({ grade, comment });

  beforeEach(async () => {
    store = new MemoryDataStore();
    app = createApp(store, { jwtSecret: TEST_SECRET, defaultLimit: 10, maxLimit: 100 });
    product = await addProduct(store, 'linen-bath-towel');
    customer = await addUser(store, 'customer', 'Casey', 'Customer');
    const admin = await addUser(store, 'admin', 'Ada', 'Admin');
    customerToken = generateToken(customer.id, TEST_SECRET, 3600);
    adminToken = generateToken(admin.id, TEST_SECRET, 3600);
  });

  it('should answer the health check', async () => {
    const res = await request(app).get('/api/health');

    expect(res.status).toBe(200);
    expect(res.body.status).toBe('OK');
  });

  describe('POST /api/products/:slug/reviews', () => {
    it('should create a review and return the fresh rating', async () => {
      const res = await submit(4, 'Thick and soft');

      expect(res.status).toBe(201);
      expect(res.body.review).toMatchObject({
        id: 1,
        author: customer.id,
        product: product.id,
        grade: 4,
        comment: 'Thick and soft',
        active: true,
      });
      expect(res.body.product).toEqual({ productId: product.id, rating: 4, reviewCount: 1 });
    });

    it('should reject requests without a token', async () => {
      const res = await request(app).post(`/api/products/${product.slug}/reviews`).send({ grade: 4 });

      expect(res.status).toBe(401);
      expect(res.body.message).toBe('Not authorized, no token');
    });

    it('should reject a token signed with another secret', async () => {
      const res = await submit(4, undefined, generateToken(customer.id, 'other-secret', 3600));

      expect(res.status).toBe(401);
      expect(res.body.message).toBe('Not authorized, token failed');
    });

    it('should answer 403 when an admin tries to review', async () => {
      const res = await submit(4, undefined, adminToken);

      expect(res.status).toBe(403);
      expect(res.body.message).toBe('Only customers can review products');
    });

    it('should answer 404 for an unknown product', async () => {
      const res = await request(app)
        .post('/api/products/no-such-towel/reviews')
        .set('Authorization', `Bearer ${customerToken}`)
        .send({ grade: 4 });

      expect(res.status).toBe(404);
      expect(res.body.message).toBe('Product not found');
    });

    it('should answer 404 for an inactive product', async () => {
      await addProduct(store, 'striped-beach-towel', false);

      const res = await request(app)
        .post('/api/products/striped-beach-towel/reviews')
        .set('Authorization', `Bearer ${customerToken}`)
        .send({ grade: 4 });

      expect(res.status).toBe(404);
    });

    it('should answer 400 for a grade outside 1..5', async () => {
      const res = await submit(6);

      expect(res.status).toBe(400);
      expect(res.body.message).toBe('Grade must be an integer between 1 and 5');
    });

    it('should answer 400 with field errors for a non-numeric grade', async () => {
      const res = await submit('five');

      expect(res.status).toBe(400);
      expect(res.body.errors[0].msg).toBe('grade must be an integer');
      expect(res.body.errors[0].path).toBe('grade');
    });

    it('should answer 400 for a malformed JSON body', async () => {
      const res = await request(app)
        .post(`/api/products/${product.slug}/reviews`)
        .set('Authorization', `Bearer ${customerToken}`)
        .set('Content-Type', 'application/json')
        .send('{"grade": 4');

      expect(res.status).toBe(400);
      expect(res.body.message).toBe('Malformed JSON body');
    });
  });

  describe('GET /api/products/:slug', () => {
    it('should show the rating rolled up from 5, 2 and 1', async () => {
      await submit(5);
      await submit(2);
      await submit(1);

      const res = await request(app).get(`/api/products/${product.slug}`);

      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({ slug: 'linen-bath-towel', rating: 2.7, reviewCount: 3 });
    });

    it('should answer 404 for an unknown product', async () => {
      const res = await request(app).get('/api/products/no-such-towel');

      expect(res.status).toBe(404);
    });
  });

  describe('GET /api/products/:slug/reviews', () => {
    it('should return an empty list when there are no reviews', async () => {
      const res = await request(app).get(`/api/products/${product.slug}/reviews`);

      expect(res.status).toBe(200);
      expect(res.body).toEqual([]);
    });

    it('should list newest first with the default limit of 10', async () => {
      for (let i = 0; i < 12; i++) {
        await submit(3);
      }

      const res = await request(app).get(`/api/products/${product.slug}/reviews`);

      expect(res.status).toBe(200);
      expect(res.body).toHaveLength(10);
      expect(res.body[0].id).toBe(12);
      expect(res.body[9].id).toBe(3);
    });

    it('should honour the limit query parameter', async () => {
      await submit(5);
      await submit(4);
      await submit(3);

      const res = await request(app).get(`/api/products/${product.slug}/reviews?limit=2`);

      expect(res.body.map((r: { id: number }) => r.id)).toEqual([3, 2]);
    });

    it('should show the author as id and display name only', async () => {
      await submit(5, 'Great');

      const res = await request(app).get(`/api/products/${product.slug}/reviews`);

      expect(res.body[0].author).toEqual({ id: customer.id, displayName: 'Casey Customer' });
    });

    it.each(['0', '101', 'ten'])('should answer 400 for limit=%s', async (limit) => {
      const res = await request(app).get(`/api/products/${product.slug}/reviews?limit=${limit}`);

      expect(res.status).toBe(400);
    });
  });

  describe('DELETE /api/reviews/:id', () => {
    it('should soft-delete and recompute to 3.5', async () => {
      await submit(5);
      await submit(2);
      const low = await submit(1);

      const res = await request(app)
        .delete(`/api/reviews/${low.body.review.id}`)
        .set('Authorization', `Bearer ${adminToken}`);

      expect(res.status).toBe(200);
      expect(res.body.review.active).toBe(false);
      expect(res.body.product.rating).toBe(3.5);
    });

    it('should answer 404 when the review is already deleted', async () => {
      const created = await submit(4);
      const path = `/api/reviews/${created.body.review.id}`;
      await request(app).delete(path).set('Authorization', `Bearer ${adminToken}`);

      const res = await request(app).delete(path).set('Authorization', `Bearer ${adminToken}`);

      expect(res.status).toBe(404);
      expect(res.body.message).toBe('Review not found');
    });

    it('should answer 403 for a customer', async () => {
      const created = await submit(4);

      const res = await request(app)
        .delete(`/api/reviews/${created.body.review.id}`)
        .set('Authorization', `Bearer ${customerToken}`);

      expect(res.status).toBe(403);
      expect(res.body.message).toBe('Only admins can delete reviews');
    });

    it('should answer 400 for a non-numeric id', async () => {
      const res = await request(app).delete('/api/reviews/abc').set('Authorization', `Bearer ${adminToken}`);

      expect(res.status).toBe(400);
    });
  });

  describe('GET /api/reviews', () => {
    it('should list only active reviews', async () => {
      const first = await submit(5);
      await submit(1);
      await request(app)
        .delete(`/api/reviews/${first.body.review.id}`)
        .set('Authorization', `Bearer ${adminToken}`);

      const res = await request(app).get('/api/reviews');

      expect(res.status).toBe(200);
      expect(res.body).toHaveLength(1);
      expect(res.body[0]).toMatchObject({ id: 2, grade: 1, active: true, comment: null });
    });
  });

  it('should answer 404 for unknown routes', async () => {
    const res = await request(app).get('/api/nothing-here');

    expect(res.status).toBe(404);
  });
});
