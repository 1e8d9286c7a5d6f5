import { Hono } from 'hono';
import type { Orchestrator } from '../../orchestrator/Orchestrator.js';
import { readBody, readQuery } from '../middleware/index.js';
import {
  EventsQuerySchema,
  RecordOutcomeSchema,
  RegisterResumeSchema,
  ReviewDecisionSchema,
  SubmitApplicationSchema,
} from '../schemas/index.js';

export function createResumeRoutes(orchestrator: Orchestrator) {
  const resumes = new Hono();

  // ─── POST /resumes - Register an original resume ───────────────

  resumes.post('/', async (c) => {
    const body = await readBody(c, RegisterResumeSchema);
    if (!body.ok) return body.response;

    const resume = await orchestrator.registerResume(body.data);
    return c.json(resume, 201);
  });

  return resumes;
}

export function createApplicationRoutes(orchestrator: Orchestrator) {
  const applications = new Hono();

  // ─── POST /applications - Submit a job for a candidate ─────────

  applications.post('/', async (c) => {
    const body = await readBody(c, SubmitApplicationSchema);
    if (!body.ok) return body.response;

    const result = await orchestrator.submitJob(body.data);
    return c.json({ application: result.application, created: result.created }, result.created ? 201 : 200);
  });

  // ─── GET /applications/:id - Status ────────────────────────────

  applications.get('/:id', async (c) => {
    const status = await orchestrator.getStatus(c.req.param('id'));
    return c.json(status);
  });

  // ─── GET /applications/:id/events - Transition history ─────────

  applications.get('/:id/events', async (c) => {
    const status = await orchestrator.getStatus(c.req.param('id'));
    return c.json({ events: status.events });
  });

  // ─── POST /applications/:id/approve|reject|cancel ──────────────

  applications.post('/:id/approve', async (c) => {
    const body = await readBody(c, ReviewDecisionSchema, { optional: true });
    if (!body.ok) return body.response;
    const application = await orchestrator.approve(c.req.param('id'), body.data.reason);
    return c.json({ application });
  });

  applications.post('/:id/reject', async (c) => {
    const body = await readBody(c, ReviewDecisionSchema, { optional: true });
    if (!body.ok) return body.response;
    const application = await orchestrator.reject(c.req.param('id'), body.data.reason);
    return c.json({ application });
  });

  applications.post('/:id/cancel', async (c) => {
    const body = await readBody(c, ReviewDecisionSchema, { optional: true });
    if (!body.ok) return body.response;
    const result = await orchestrator.cancel(c.req.param('id'), body.data.reason);
    return c.json(result, result.status === 'pending' ? 202 : 200);
  });

  // ─── POST /applications/:id/outcome - Employer response ────────

  applications.post('/:id/outcome', async (c) => {
    const body = await readBody(c, RecordOutcomeSchema);
    if (!body.ok) return body.response;
    const application = await orchestrator.recordOutcome(c.req.param('id'), body.data.outcome, body.data.reason);
    return c.json({ application });
  });

  return applications;
}

export function createFollowUpRoutes(orchestrator: Orchestrator) {
  const followUps = new Hono();

  // ─── GET /follow-ups - Submissions that have gone quiet ────────

  followUps.get('/', async (c) => {
    const applications = await orchestrator.listFollowUps();
    return c.json({ applications });
  });

  return followUps;
}

export function createEventRoutes(orchestrator: Orchestrator) {
  const events = new Hono();

  // ─── GET /events?after=&limit= - Global event feed ─────────────

  events.get('/', async (c) => {
    const query = readQuery(c, EventsQuerySchema);
    if (!query.ok) return query.response;

    const page = await orchestrator.eventsAfter(query.data.after, query.data.limit);
    const last = page[page.length - 1];
    return c.json({ events: page, next: last ? last.position : query.data.after });
  });

  return events;
}
