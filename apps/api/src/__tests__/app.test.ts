import { describe, it, expect, vi } from 'vitest';
import { createTestHarness, TEST_PASSWORD, TestClient } from '../test/helpers.js';

describe('createApp', () => {
  it('answers the health check without a session', async () => {
    const { app } = createTestHarness();

    const response = await app.request('/health');

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({ status: 'ok', version: '0.1.0' });
  });

  it('tags every response with a request id', async () => {
    const client = new TestClient(createTestHarness().app);

    const ok = await client.get('/health');
    const unauthorized = await client.get('/v1/users/me');
    const missing = await client.get('/v1/nothing-here');

    for (const response of [ok, unauthorized, missing]) {
      expect(response.headers.get('x-request-id')).toMatch(/^[0-9a-f-]{36}$/);
    }
  });

  it('answers unknown paths with a JSON 404', async () => {
    const response = await createTestHarness().app.request('/v1/nothing-here');

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ error: 'not_found', message: 'Not found.' });
  });

  it('answers a body that is not JSON with 400', async () => {
    const response = await createTestHarness().app.request('/v1/sessions', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"email":',
    });

    expect(response.status).toBe(400);
    expect(await response.json()).toMatchObject({ error: 'bad_request' });
  });

  it('hides unexpected failures behind a 500 carrying the request id', async () => {
    const harness = createTestHarness();
    vi.spyOn(harness.services.users, 'findByEmail').mockRejectedValue(new Error('connection refused'));

    const response = await harness.app.request('/v1/sessions', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', 'x-request-id': 'req-500' },
      body: JSON.stringify({ email: 'member@example.com', password: TEST_PASSWORD }),
    });

    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({
      error: 'internal_error',
      message: 'Something went wrong.',
      requestId: 'req-500',
    });
  });

  it('refuses cross-origin mutations before touching the session', async () => {
    const harness = createTestHarness();

    const response = await harness.app.request('/v1/sessions', {
      method: 'DELETE',
      headers: { origin: 'https://attacker.example' },
    });

    expect(response.status).toBe(403);
    expect(harness.events.events).toHaveLength(0);
  });
});
