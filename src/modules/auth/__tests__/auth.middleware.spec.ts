import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import Fastify, { type FastifyInstance } from 'fastify';
import { actorOf, parseActorRoles, registerAuth } from '../auth.middleware.js';

describe('parseActorRoles', () => {
  it('normalizes case, drops unknown roles and duplicates', () => {
    expect(parseActorRoles(' teacher ,ADMIN,teacher,owner')).toEqual(['TEACHER', 'ADMIN']);
    expect(parseActorRoles(['student', 'admin,student'])).toEqual(['STUDENT', 'ADMIN']);
    expect(parseActorRoles(undefined)).toEqual([]);
  });
});

describe('registerAuth middleware', () => {
  let app: FastifyInstance;

  beforeEach(() => {
    app = Fastify();
    app.addHook('onRequest', registerAuth);
    app.get('/whoami', async req => actorOf(req));
  });

  afterEach(async () => {
    await app.close();
  });

  it('rejects when tenant header is missing', async () => {
    const response = await app.inject({ method: 'GET', url: '/whoami', headers: { 'x-actor-id': 'student-1' } });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toMatchObject({ message: 'Missing x-tenant-id header' });
  });

  it('rejects tenant ids outside the allowed alphabet', async () => {
    const response = await app.inject({
      method: 'GET',
      url: '/whoami',
      headers: { 'x-tenant-id': '../outside/evil', 'x-actor-id': 'student-1', 'x-actor-roles': 'student' },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toMatchObject({ message: 'Invalid x-tenant-id header' });
  });

  it('rejects when actor header is missing', async () => {
    const response = await app.inject({ method: 'GET', url: '/whoami', headers: { 'x-tenant-id': 'tenant-1' } });

    expect(response.statusCode).toBe(401);
    expect(response.json()).toMatchObject({ message: 'Missing x-actor-id header' });
  });

  it('rejects requests without a known role', async () => {
    const response = await app.inject({
      method: 'GET',
      url: '/whoami',
      headers: { 'x-tenant-id': 'tenant-1', 'x-actor-id': 'student-1', 'x-actor-roles': 'guest' },
    });

    expect(response.statusCode).toBe(401);
  });

  it('attaches the actor to the request', async () => {
    const response = await app.inject({
      method: 'GET',
      url: '/whoami',
      headers: { 'x-tenant-id': 'tenant-1', 'x-actor-id': 'teacher-1', 'x-actor-roles': 'teacher,admin' },
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ tenantId: 'tenant-1', actorId: 'teacher-1', roles: ['TEACHER', 'ADMIN'] });
  });
});
