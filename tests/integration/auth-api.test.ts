import request from 'supertest';
import { Express } from 'express';
import { createApp } from '../../src/app';
import { MemoryDataStore } from '../../src/store/memoryStore';
import { addProduct, TEST_SECRET } from '../helpers/fixtures';

describe('Auth API', () => {
  let store: MemoryDataStore;
  let app: Express;

  const register = () =>
    request(app).post('/api/auth/register').send({
      email: 'robin@example.com',
      password: 'placeholder-pass',
      firstName: 'Robin',
      lastName: 'Reviewer',
    });

  beforeEach(() => {
    store = new MemoryDataStore();
    app = createApp(store, { jwtSecret: TEST_SECRET });
  });

  it('should register a customer and return a token', async () => {
    const res = await register();

    expect(res.status).toBe(201);
    expect(res.body).toMatchObject({
      email: 'robin@example.com',
      firstName: 'Robin',
      lastName: 'Reviewer',
      role: 'customer',
    });
    expect(typeof res.body.token).toBe('string');
    expect(res.body.password).toBeUndefined();
  });

  it('should refuse a second registration with the same email', async () => {
    await register();

    const res = await register();

    expect(res.status).toBe(400);
    expect(res.body.message).toBe('User already exists');
  });

  it('should log in with the right password only', async () => {
    await register();

    const ok = await request(app)
      .post('/api/auth/login')
      .send({ email: 'robin@example.com', password: 'placeholder-pass' });
    const bad = await request(app).post('/api/auth/login').send({ email: 'robin@example.com', password: 'wrong-pass' });

    expect(ok.status).toBe(200);
    expect(typeof ok.body.token).toBe('string');
    expect(bad.status).toBe(401);
    expect(bad.body.message).toBe('Invalid credentials');
  });

  it('should answer a login with the account fields and a token only', async () => {
    const { body: registered } = await register();

    const res = await request(app)
      .post('/api/auth/login')
      .send({ email: 'robin@example.com', password: 'placeholder-pass' });

    expect(Object.keys(res.body).sort()).toEqual(['_id', 'email', 'firstName', 'lastName', 'role', 'token']);
    expect(res.body._id).toBe(registered._id);
  });

  it('should let a registered customer review a product', async () => {
    await addProduct(store, 'waffle-robe');
    const { body } = await register();

    const res = await request(app)
      .post('/api/products/waffle-robe/reviews')
      .set('Authorization', `Bearer ${body.token}`)
      .send({ grade: 5 });

    expect(res.status).toBe(201);
    expect(res.body.product.rating).toBe(5);
  });

  it('should return the current user from /me', async () => {
    const { body } = await register();

    const res = await request(app).get('/api/auth/me').set('Authorization', `Bearer ${body.token}`);

    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      _id: body._id,
      email: 'robin@example.com',
      firstName: 'Robin',
      lastName: 'Reviewer',
      role: 'customer',
    });
  });
});
