import { PipelineState } from '../../src/domain/run';
import { createDefaultDefinition } from '../../src/dsl/schema';
import { resetLogging, setLogHandler } from '../../src/logger';
import { AppContext, createApp, createAppContext } from '../../src/server';
import {
  FakeReleaseHost,
  FakeToolchain,
  FakeToolchainOptions,
  createFakeReleaseHost,
  createFakeToolchain,
  makeTempDir,
  removeDir,
  waitFor,
} from '../helpers/fakes';
import { TestClient, field, startTestServer } from '../helpers/http';

describe('Run API', () => {
  let workDir: string;
  let ctx: AppContext;
  let client: TestClient;
  let toolchain: FakeToolchain;
  let host: FakeReleaseHost;

  async function setup(options: FakeToolchainOptions = {}): Promise<void> {
    toolchain = createFakeToolchain(options);
    host = createFakeReleaseHost();
    ctx = createAppContext({
      definition: { ...createDefaultDefinition(), policy: { maxAttempts: 1, backoffBaseMs: 0, stepTimeoutMs: 0 } },
      toolchain,
      workDir,
      release: { host, credentials: { token: 'test-secret' } },
    });
    client = await startTestServer(createApp(ctx));
  }

  async function waitForState(runId: string, state: PipelineState): Promise<void> {
    await waitFor(async () => (await ctx.store.runs.getById(runId))?.state === state);
  }

  async function trigger(ref: string, event: string): Promise<string> {
    const res = await client.request('POST', '/api/v1/runs', { json: { ref, event } });
    expect(res.status).toBe(201);
    return String(field(res.body, 'run', 'id'));
  }

  beforeAll(() => {
    setLogHandler(() => undefined);
  });

  afterAll(() => {
    resetLogging();
  });

  beforeEach(async () => {
    workDir = await makeTempDir();
  });

  afterEach(async () => {
    await waitFor(() => ctx.orchestrator.inFlightRunIds().length === 0);
    await client.close();
    await removeDir(workDir);
  });

  it('GET /health reports status and in-flight runs', async () => {
    await setup();
    const res = await client.request('GET', '/health');

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ status: 'ok', specVersion: '1.0.0', inFlightRuns: 0 });
  });

  it('POST /runs triggers a build for a branch push', async () => {
    await setup();
    const res = await client.request('POST', '/api/v1/runs', { json: { ref: 'main', event: 'push' } });

    expect(res.status).toBe(201);
    expect(field(res.body, 'run', 'state')).toBe('triggered');
    expect(field(res.body, 'run', 'trigger')).toEqual({ eventType: 'push-to-branch', ref: 'refs/heads/main' });

    const runId = String(field(res.body, 'run', 'id'));
    await waitForState(runId, PipelineState.Done);
    expect(host.calls).toHaveLength(0);
  });

  it('a tag push releases and exposes artifacts and events', async () => {
    await setup();
    const runId = await trigger('v1.0.0', 'tag');
    await waitForState(runId, PipelineState.ReleaseSucceeded);

    const run = await client.request('GET', `/api/v1/runs/${runId}`);
    expect(field(run.body, 'run', 'release', 'files', '2', 'name')).toBe('junior-macos');
    expect(field(run.body, 'run', 'exitCode')).toBe(0);

    const artifacts = await client.request('GET', `/api/v1/runs/${runId}/artifacts`);
    expect(artifacts.status).toBe(200);
    expect(field(artifacts.body, 'artifacts', 'length')).toBe(3);

    const events = await client.request('GET', `/api/v1/runs/${runId}/events?types=run.release_started,run.release_succeeded`);
    expect(events.status).toBe(200);
    expect(field(events.body, 'total')).toBe(2);
    expect(field(events.body, 'items', '0', 'type')).toBe('run.release_started');
  });

  it('POST /runs defaults the event to a branch push', async () => {
    await setup();
    const res = await client.request('POST', '/api/v1/runs', { json: { ref: 'main' } });

    expect(res.status).toBe(201);
    expect(field(res.body, 'run', 'trigger', 'eventType')).toBe('push-to-branch');
    await waitForState(String(field(res.body, 'run', 'id')), PipelineState.Done);
  });

  it('POST /runs records a skipped run for refs outside the filters', async () => {
    await setup();
    const res = await client.request('POST', '/api/v1/runs', { json: { ref: 'feature/login', event: 'push' } });

    expect(res.status).toBe(201);
    expect(field(res.body, 'run', 'state')).toBe('skipped');
    expect(toolchain.calls).toHaveLength(0);
  });

  it('POST /runs requires a ref', async () => {
    await setup();
    const res = await client.request('POST', '/api/v1/runs', { json: { event: 'push' } });

    expect(res.status).toBe(400);
    expect(field(res.body, 'error', 'code')).toBe('VALIDATION.SCHEMA');
    expect(field(res.body, 'error', 'message')).toBe('"ref" is required');
  });

  it('POST /runs rejects unknown events', async () => {
    await setup();
    const res = await client.request('POST', '/api/v1/runs', { json: { ref: 'main', event: 'merge' } });

    expect(res.status).toBe(400);
    expect(field(res.body, 'error', 'message')).toBe('Unknown event "merge"');
  });

  it('rejects malformed JSON bodies', async () => {
    await setup();
    const res = await client.request('POST', '/api/v1/runs', { raw: '{"ref":' });

    expect(res.status).toBe(400);
    expect(field(res.body, 'error', 'code')).toBe('VALIDATION.INVALID_BODY');
  });

  it('GET /runs lists runs most recent first', async () => {
    await setup();
    await client.request('POST', '/api/v1/runs', { json: { ref: 'feature/a', event: 'push' } });
    await client.request('POST', '/api/v1/runs', { json: { ref: 'feature/b', event: 'push' } });

    const res = await client.request('GET', '/api/v1/runs?limit=1');
    expect(res.status).toBe(200);
    expect(field(res.body, 'total')).toBe(2);
    expect(field(res.body, 'hasMore')).toBe(true);
    expect(field(res.body, 'items', '0', 'trigger', 'ref')).toBe('refs/heads/feature/b');
  });

  it('GET /runs/:runId returns 404 for unknown runs', async () => {
    await setup();
    const res = await client.request('GET', '/api/v1/runs/run_missing');

    expect(res.status).toBe(404);
    expect(field(res.body, 'error', 'code')).toBe('RUN.NOT_FOUND');
  });

  it('POST /runs/:runId/cancel cancels a running build', async () => {
    await setup({ hangOn: 'checkout' });
    const runId = await trigger('main', 'push');
    await waitFor(() => toolchain.calls.length === 3);

    const res = await client.request('POST', `/api/v1/runs/${runId}/cancel`, {
      json: { reason: 'wrong commit' },
      headers: { 'x-identity-id': 'user_1' },
    });
    expect(res.status).toBe(200);

    await waitForState(runId, PipelineState.Canceled);
    const run = await ctx.store.runs.getById(runId);
    expect(run?.canceledBy).toBe('user_1');
    expect(run?.cancelReason).toBe('wrong commit');
    expect(run?.exitCode).toBe(3);
  });

  it('POST /runs/:runId/cancel rejects finished runs with 409', async () => {
    await setup();
    const runId = await trigger('main', 'push');
    await waitForState(runId, PipelineState.Done);

    const res = await client.request('POST', `/api/v1/runs/${runId}/cancel`, { json: {} });
    expect(res.status).toBe(409);
    expect(field(res.body, 'error', 'code')).toBe('RUN.INVALID_STATE_TRANSITION');
  });

  it('POST /runs/:runId/cancel returns 404 for unknown runs', async () => {
    await setup();
    const res = await client.request('POST', '/api/v1/runs/run_missing/cancel', { json: {} });
    expect(res.status).toBe(404);
  });

  it('GET /runs/:runId/events returns 404 for unknown runs', async () => {
    await setup();
    const res = await client.request('GET', '/api/v1/runs/run_missing/events');
    expect(res.status).toBe(404);
  });
});
