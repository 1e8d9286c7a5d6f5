import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import { z } from 'zod';
import { createApp } from '../../../src/api/server.js';
import { succeeded } from '../../../src/workers/stageExecutors/types.js';
import { REQUIREMENTS, advance, createHarness, gate, type Harness } from '../../integration/helpers.js';

const JOB = {
  sourceUrl: 'https://jobs.lever.co/acme/42',
  title: 'Backend Engineer',
  company: 'Acme',
  postingText: 'TypeScript and Postgres.',
};

const submitResponse = z.object({
  application: z.object({ id: z.string(), state: z.string() }),
  created: z.boolean(),
});

const CONFIRMED_PATH = ['analysis_succeeded', 'tailoring_succeeded', 'auto_submit', 'submission_confirmed'];

const applicationsResponse = z.object({ applications: z.array(z.object({ id: z.string() })) });

function json(body: unknown): RequestInit {
  return { method: 'POST', headers: { 'Content-Type': 'application/json' }, body: JSON.stringify(body) };
}

describe('control API', () => {
  let h: Harness;
  let app: ReturnType<typeof createApp>;

  beforeEach(() => {
    h = createHarness();
    app = createApp(h.orchestrator);
  });

  afterEach(async () => {
    await h.orchestrator.stop(1_000);
  });

  async function registerResume(): Promise<string> {
    const res = await app.request('/resumes', json({ candidateId: 'cand-1', content: 'Jane Doe' }));
    expect(res.status).toBe(201);
    return z.object({ id: z.string() }).parse(await res.json()).id;
  }

  async function submit(resumeId: string): Promise<Response> {
    return app.request('/applications', json({ candidateId: 'cand-1', resumeId, automationLevel: 'full', job: JOB }));
  }

  // ── Submission ───────────────────────────────────────────────────────────

  test('POST /applications creates once and returns the existing application after', async () => {
    const resumeId = await registerResume();

    const created = await submit(resumeId);
    expect(created.status).toBe(201);
    const first = submitResponse.parse(await created.json());
    expect(first.created).toBe(true);
    expect(first.application.state).toBe('discovered');

    const repeated = await submit(resumeId);
    expect(repeated.status).toBe(200);
    const second = submitResponse.parse(await repeated.json());
    expect(second.created).toBe(false);
    expect(second.application.id).toBe(first.application.id);
  });

  test('invalid bodies are 422 with field details', async () => {
    const res = await app.request('/applications', json({ resumeId: 'r-1', job: { ...JOB, sourceUrl: 'nope' } }));

    expect(res.status).toBe(422);
    const body = z
      .object({ error: z.string(), details: z.array(z.object({ field: z.string() })) })
      .parse(await res.json());
    expect(body.error).toBe('validation_error');
    expect(body.details.map((d) => d.field)).toEqual(['candidateId', 'job.sourceUrl']);
  });

  test('malformed JSON is 400', async () => {
    const res = await app.request('/applications', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"candidateId": ',
    });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'bad_request', message: 'Invalid JSON body' });
  });

  test('an unknown resume is 422', async () => {
    const res = await submit('missing-resume');

    expect(res.status).toBe(422);
    expect(await res.json()).toEqual({ error: 'resume_not_found', message: 'Resume not found: missing-resume' });
  });

  // ── Status and controls ──────────────────────────────────────────────────

  test('GET /applications/:id returns status and 404 when unknown', async () => {
    const resumeId = await registerResume();
    const { application } = submitResponse.parse(await (await submit(resumeId)).json());

    const res = await app.request(`/applications/${application.id}`);
    expect(res.status).toBe(200);
    const status = z
      .object({ job: z.object({ platform: z.string() }), events: z.array(z.unknown()), inFlight: z.boolean() })
      .parse(await res.json());
    expect(status.job.platform).toBe('lever');
    expect(status.events).toEqual([]);
    expect(status.inFlight).toBe(false);

    const missing = await app.request('/applications/nope');
    expect(missing.status).toBe(404);
    expect(await missing.json()).toEqual({ error: 'application_not_found', message: 'Application not found: nope' });
  });

  test('approving outside review is 409', async () => {
    const resumeId = await registerResume();
    const { application } = submitResponse.parse(await (await submit(resumeId)).json());

    const res = await app.request(`/applications/${application.id}/approve`, { method: 'POST' });

    expect(res.status).toBe(409);
    expect(await res.json()).toEqual({
      error: 'illegal_transition',
      message: "Transition 'approved' is not allowed from state 'discovered'",
    });
  });

  test('cancel is 200 when idle and 202 while a stage runs', async () => {
    const resumeId = await registerResume();
    const { application: idle } = submitResponse.parse(await (await submit(resumeId)).json());

    const cancelled = await app.request(`/applications/${idle.id}/cancel`, json({ reason: 'Changed my mind' }));
    expect(cancelled.status).toBe(200);
    expect(await cancelled.json()).toMatchObject({
      status: 'cancelled',
      application: { state: 'cancelled', statusReason: 'Changed my mind' },
    });

    const blocked = gate(succeeded(REQUIREMENTS));
    h.analysis.script.queue(blocked.step);
    const { application: busy } = submitResponse.parse(await (await submit(resumeId)).json());
    const dispatched = h.orchestrator.scheduler.dispatch(busy.id);
    await vi.waitFor(() => expect(h.analysis.script.calls).toBe(1));

    const pending = await app.request(`/applications/${busy.id}/cancel`, { method: 'POST' });
    expect(pending.status).toBe(202);
    expect(await pending.json()).toMatchObject({ status: 'pending' });

    blocked.release();
    expect(await dispatched).toBe('cancelled');
  });

  // ── Outcomes and follow-ups ──────────────────────────────────────────────

  async function confirmedApplication(): Promise<string> {
    const resumeId = await registerResume();
    const { application } = submitResponse.parse(await (await submit(resumeId)).json());
    const stored = await h.repo.getApplication(application.id);
    if (!stored) throw new Error('application was not stored');
    await advance(h.orchestrator.eventLog, stored, CONFIRMED_PATH);
    return application.id;
  }

  test('POST /applications/:id/outcome records employer responses until one is final', async () => {
    const id = await confirmedApplication();

    const reviewing = await app.request(`/applications/${id}/outcome`, json({ outcome: 'under_review' }));
    expect(reviewing.status).toBe(200);
    expect(await reviewing.json()).toMatchObject({
      application: { id, state: 'confirmed', outcome: 'under_review', statusReason: 'Outcome recorded: under_review' },
    });

    const rejected = await app.request(
      `/applications/${id}/outcome`,
      json({ outcome: 'rejected', reason: 'Position filled' }),
    );
    expect(rejected.status).toBe(200);

    const late = await app.request(`/applications/${id}/outcome`, json({ outcome: 'accepted' }));
    expect(late.status).toBe(409);
    expect(await late.json()).toEqual({
      error: 'outcome_closed',
      message: `Application ${id} already has the final outcome 'rejected'`,
    });
  });

  test('outcomes are validated and need a confirmed application', async () => {
    const resumeId = await registerResume();
    const { application } = submitResponse.parse(await (await submit(resumeId)).json());

    const unknown = await app.request(`/applications/${application.id}/outcome`, json({ outcome: 'hired' }));
    expect(unknown.status).toBe(422);
    const body = z.object({ details: z.array(z.object({ field: z.string() })) }).parse(await unknown.json());
    expect(body.details.map((d) => d.field)).toEqual(['outcome']);

    const early = await app.request(`/applications/${application.id}/outcome`, json({ outcome: 'rejected' }));
    expect(early.status).toBe(409);
    expect(await early.json()).toEqual({
      error: 'illegal_transition',
      message: "Transition 'outcome_recorded' is not allowed from state 'discovered'",
    });

    const missing = await app.request('/applications/nope/outcome', json({ outcome: 'rejected' }));
    expect(missing.status).toBe(404);
  });

  test('GET /follow-ups lists confirmed applications with no response after a week', async () => {
    await h.orchestrator.stop(1_000);
    let offsetMs = 0;
    h = createHarness({ clock: () => Date.now() + offsetMs });
    app = createApp(h.orchestrator);
    const id = await confirmedApplication();

    const fresh = await app.request('/follow-ups');
    expect(fresh.status).toBe(200);
    expect(applicationsResponse.parse(await fresh.json()).applications).toEqual([]);

    offsetMs = 8 * 24 * 60 * 60 * 1000;
    const quiet = applicationsResponse.parse(await (await app.request('/follow-ups')).json());
    expect(quiet.applications.map((a) => a.id)).toEqual([id]);
  });

  // ── Events and health ────────────────────────────────────────────────────

  test('GET /events pages through the global log', async () => {
    const resumeId = await registerResume();
    const { application } = submitResponse.parse(await (await submit(resumeId)).json());
    await app.request(`/applications/${application.id}/cancel`, { method: 'POST' });

    const res = await app.request('/events?after=0&limit=10');
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      events: [{ applicationId: application.id, trigger: 'cancel', position: 1 }],
      next: 1,
    });

    const empty = await app.request('/events?after=1');
    expect(await empty.json()).toEqual({ events: [], next: 1 });

    const invalid = await app.request('/events?limit=0');
    expect(invalid.status).toBe(422);
  });

  test('GET /health reports the scheduler state', async () => {
    const res = await app.request('/health');

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      status: 'stopped',
      service: 'applyflow',
      scheduler: { running: false, active: 0, queued: 0 },
    });
  });

  test('unknown routes are 404', async () => {
    const res = await app.request('/nothing-here');
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'not_found', message: 'Route not found' });
  });
});
