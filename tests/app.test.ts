/**
 * Basic integration tests for the Express app.
 *
 * This verifies that the healthcheck endpoint is wired correctly
 * and that the app can be instantiated without any routes mounted.
 */
import request from 'supertest';
import { createApp } from '../src/app';

describe('weather tools app', () => {
  it('should respond to GET /health with status 200 and JSON body', async () => {
    const response = await request(createApp()).get('/health');

    expect(response.status).toBe(200);
    expect(response.headers['content-type']).toMatch(/application\/json/);
    expect(response.body).toHaveProperty('status', 'ok');
    expect(response.body).toHaveProperty('service', 'weather-tools-service');
    expect(typeof response.body.timestamp).toBe('string');
  });

  it('reports the configured service name', async () => {
    const response = await request(createApp({ serviceName: 'weather-edge' })).get('/health');

    expect(response.body).toHaveProperty('service', 'weather-edge');
  });

  it('does not expose tool routes when no tool server is given', async () => {
    const response = await request(createApp()).get('/tools/list');

    expect(response.status).toBe(404);
  });
});
