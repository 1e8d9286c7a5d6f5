import { afterEach, describe, expect, test, vi } from 'vitest';
import { ApplicationBusyError, IllegalTransitionError, OutcomeClosedError } from '../../src/lifecycle/errors.js';
import { failed, succeeded } from '../../src/workers/stageExecutors/types.js';
import {
  CONFIRMATION_TOKEN,
  REQUIREMENTS,
  after,
  createHarness,
  gate,
  submitApplication,
  triggersOf,
  untilAborted,
  waitForState,
  type Harness,
} from './helpers.js';

describe('Scheduler', () => {
  let h: Harness;

  afterEach(async () => {
    await h.orchestrator.stop(1_000);
  });

  // ── Happy path ───────────────────────────────────────────────────────────

  test('a fully automated application runs through to confirmed', async () => {
    h = createHarness();
    await h.orchestrator.start();

    const app = await submitApplication(h, { tailoringMode: 'moderate' });
    const done = await waitForState(h, app.id, 'confirmed');

    expect(done.confirmationToken).toBe(CONFIRMATION_TOKEN);
    expect(done.statusReason).toBe('Submission confirmed by the platform');
    expect(await triggersOf(h, app.id)).toEqual([
      'analysis_succeeded',
      'tailoring_succeeded',
      'auto_submit',
      'submission_confirmed',
    ]);

    const status = await h.orchestrator.getStatus(app.id);
    expect(status.job?.requirements).toEqual(REQUIREMENTS);
    expect(status.resume).toMatchObject({
      content: 'Tailored resume',
      parentId: app.baseResumeId,
      tailoringMode: 'moderate',
      lineage: { jobId: app.jobId, applicationId: app.id, attempt: 0 },
    });
    expect(done.resumeId).not.toBe(app.baseResumeId);
    expect(h.submission.sessions).toEqual(['session-greenhouse-1']);
  });

  test('a second candidate on the same job reuses the extracted requirements', async () => {
    h = createHarness();
    await h.orchestrator.start();

    const first = await submitApplication(h);
    await waitForState(h, first.id, 'confirmed');

    const resume = await h.orchestrator.registerResume({ candidateId: 'cand-2', content: 'John Roe\nEngineer.' });
    const { application: second } = await h.orchestrator.submitJob({
      candidateId: 'cand-2',
      resumeId: resume.id,
      automationLevel: 'full',
      job: {
        sourceUrl: 'https://boards.greenhouse.io/acme/jobs/123',
        title: 'Backend Engineer',
        company: 'Acme',
        postingText: 'We need a TypeScript engineer with 3 years of Postgres experience.',
      },
    });
    await waitForState(h, second.id, 'confirmed');

    expect(second.jobId).toBe(first.jobId);
    expect(h.analysis.script.calls).toBe(1);
    const { events } = await h.orchestrator.getStatus(second.id);
    expect(events[0]?.reason).toBe('Requirements already extracted for this job');
  });

  test('without a token the submission waits in submitted until the confirmation check passes', async () => {
    h = createHarness();
    h.submission.submitScript.queue(succeeded({ confirmationToken: null }));
    h.submission.confirmScript.queue(succeeded({ confirmed: false, confirmationToken: null }));
    await h.orchestrator.start();

    const app = await submitApplication(h);
    const done = await waitForState(h, app.id, 'confirmed');

    expect(done.confirmationToken).toBe(CONFIRMATION_TOKEN);
    expect(h.submission.confirmScript.calls).toBe(2);
    expect(await triggersOf(h, app.id)).toEqual([
      'analysis_succeeded',
      'tailoring_succeeded',
      'auto_submit',
      'submission_accepted',
      'submission_confirmed',
    ]);
  });

  test('a platform with no confirmation check is confirmed on submission without a token', async () => {
    h = createHarness({ withoutConfirmation: true });
    h.submission.submitScript.queue(succeeded({ confirmationToken: null }));
    await h.orchestrator.start();

    const app = await submitApplication(h);
    const done = await waitForState(h, app.id, 'confirmed');

    expect(done.confirmationToken).toBeNull();
    expect(done.submittedAt).not.toBeNull();
    expect(done.statusReason).toBe('Submitted; greenhouse gives no confirmation token or check');
    expect(await triggersOf(h, app.id)).toEqual([
      'analysis_succeeded',
      'tailoring_succeeded',
      'auto_submit',
      'submission_confirmed',
    ]);
  });

  test('a submission the platform never confirms fails once the confirmation window closes', async () => {
    let offsetMs = 0;
    h = createHarness({ clock: () => Date.now() + offsetMs });
    const pending = succeeded({ confirmed: false, confirmationToken: null });
    h.submission.submitScript.queue(succeeded({ confirmationToken: null }));
    h.submission.confirmScript.queue(pending, async () => {
      offsetMs += 49 * 60 * 60 * 1000;
      return pending;
    });
    await h.orchestrator.start();

    const app = await submitApplication(h);
    const dead = await waitForState(h, app.id, 'failed');

    expect(h.submission.confirmScript.calls).toBe(2);
    expect(dead.lastError).toBe('timeout');
    expect(dead.statusReason).toBe(
      'No platform confirmation within 48h of submission; check the platform before applying again',
    );
    expect(await triggersOf(h, app.id)).toEqual([
      'analysis_succeeded',
      'tailoring_succeeded',
      'auto_submit',
      'submission_accepted',
      'stage_failed',
    ]);
  });

  // ── Review ───────────────────────────────────────────────────────────────

  test('assisted applications stop for review and can be rejected', async () => {
    h = createHarness();
    await h.orchestrator.start();

    const app = await submitApplication(h, { automationLevel: 'assisted' });
    const waiting = await waitForState(h, app.id, 'needs_review');
    expect(waiting.statusReason).toBe('Waiting for approval before submission');

    const rejected = await h.orchestrator.reject(app.id, 'Not a fit');
    expect(rejected.state).toBe('cancelled');
    expect(rejected.statusReason).toBe('Not a fit');
    expect(h.submission.submitScript.calls).toBe(0);
    expect(await triggersOf(h, app.id)).toEqual([
      'analysis_succeeded',
      'tailoring_succeeded',
      'approval_required',
      'rejected',
    ]);
  });

  test('automation detection sends the application to review and approval resumes submission', async () => {
    h = createHarness();
    h.submission.submitScript.queue(failed('automation_detected', 'CAPTCHA shown'));
    await h.orchestrator.start();

    const app = await submitApplication(h);
    const flagged = await waitForState(h, app.id, 'needs_review');
    expect(flagged.lastError).toBe('automation_detected');
    expect(flagged.attempt).toBe(1);
    expect(flagged.statusReason).toBe(
      'Automation detected during submission (attempt 1/3): CAPTCHA shown; waiting for human review',
    );
    expect(h.submission.submitScript.calls).toBe(1);
    expect(h.orchestrator.stats().scheduler.queued).toBe(0);

    await h.orchestrator.approve(app.id);
    await waitForState(h, app.id, 'confirmed');

    expect(await triggersOf(h, app.id)).toEqual([
      'analysis_succeeded',
      'tailoring_succeeded',
      'auto_submit',
      'automation_detected',
      'approved',
      'submission_confirmed',
    ]);
  });

  test('automation detection on the last allowed attempt still goes to review', async () => {
    h = createHarness();
    const reset = failed<never>('transient_network', 'connection reset');
    h.submission.submitScript.queue(reset, reset, failed('automation_detected', 'CAPTCHA shown'));
    await h.orchestrator.start();

    const app = await submitApplication(h);
    const flagged = await waitForState(h, app.id, 'needs_review');

    expect(flagged.attempt).toBe(3);
    expect(flagged.statusReason).toBe(
      'Automation detected during submission (attempt 3/3): CAPTCHA shown; waiting for human review',
    );
    expect(await triggersOf(h, app.id)).toEqual([
      'analysis_succeeded',
      'tailoring_succeeded',
      'auto_submit',
      'stage_retry',
      'stage_retry',
      'automation_detected',
    ]);
  });

  test('approve is rejected outside review', async () => {
    h = createHarness();
    const app = await submitApplication(h);
    await expect(h.orchestrator.approve(app.id)).rejects.toThrow(IllegalTransitionError);
    expect((await h.repo.getApplication(app.id))?.state).toBe('discovered');
  });

  test('unresolved reviews are cancelled once the review timeout passes', async () => {
    let now = Date.parse('2026-03-02T09:00:00.000Z');
    h = createHarness({ clock: () => now });
    await h.orchestrator.start();

    const app = await submitApplication(h, { automationLevel: 'assisted' });
    await waitForState(h, app.id, 'needs_review');

    now += 24 * 60 * 60 * 1000;
    await h.orchestrator.scheduler.sweep();
    expect((await h.repo.getApplication(app.id))?.state).toBe('needs_review');

    now += 7 * 24 * 60 * 60 * 1000;
    await h.orchestrator.scheduler.sweep();
    const expired = await h.repo.getApplication(app.id);
    expect(expired?.state).toBe('cancelled');
    expect(expired?.statusReason).toBe('No review decision within 168h; cancelled automatically');

    const { events } = await h.orchestrator.getStatus(app.id);
    expect(events[events.length - 1]).toMatchObject({ trigger: 'review_timeout', cause: 'timeout' });
  });

  // ── Outcomes ─────────────────────────────────────────────────────────────

  test('employer outcomes are recorded on confirmed applications until one is final', async () => {
    h = createHarness();
    await h.orchestrator.start();

    const app = await submitApplication(h);
    await waitForState(h, app.id, 'confirmed');

    const reviewing = await h.orchestrator.recordOutcome(app.id, 'under_review');
    expect(reviewing.state).toBe('confirmed');
    expect(reviewing.outcome).toBe('under_review');
    expect(reviewing.statusReason).toBe('Outcome recorded: under_review');

    const rejected = await h.orchestrator.recordOutcome(app.id, 'rejected', 'Position filled');
    expect(rejected.outcome).toBe('rejected');
    expect(rejected.statusReason).toBe('Position filled');

    await expect(h.orchestrator.recordOutcome(app.id, 'accepted')).rejects.toThrow(OutcomeClosedError);
    expect((await h.repo.getApplication(app.id))?.outcome).toBe('rejected');
    expect((await triggersOf(h, app.id)).slice(-2)).toEqual(['outcome_recorded', 'outcome_recorded']);
  });

  test('outcomes cannot be recorded before the submission is confirmed', async () => {
    h = createHarness();
    await h.orchestrator.start();

    const app = await submitApplication(h, { automationLevel: 'assisted' });
    await waitForState(h, app.id, 'needs_review');

    await expect(h.orchestrator.recordOutcome(app.id, 'rejected')).rejects.toThrow(IllegalTransitionError);
  });

  test('follow-ups list confirmed applications that went quiet', async () => {
    h = createHarness();
    await h.orchestrator.start();

    const app = await submitApplication(h);
    const done = await waitForState(h, app.id, 'confirmed');
    const submittedAt = Date.parse(done.submittedAt ?? '');
    const day = 24 * 60 * 60 * 1000;

    expect(await h.orchestrator.listFollowUps(submittedAt + 7 * day)).toEqual([]);
    expect((await h.orchestrator.listFollowUps(submittedAt + 8 * day)).map((a) => a.id)).toEqual([app.id]);

    await h.orchestrator.recordOutcome(app.id, 'under_review');
    expect(await h.orchestrator.listFollowUps(submittedAt + 8 * day)).toEqual([]);
    expect((await h.orchestrator.listFollowUps(submittedAt + 15 * day)).map((a) => a.id)).toEqual([app.id]);
  });

  // ── Failures ─────────────────────────────────────────────────────────────

  test('transient failures retry until the attempt ceiling, then fail', async () => {
    h = createHarness();
    const reset = failed<never>('transient_network', 'connection reset');
    h.analysis.script.queue(reset, reset, reset);
    await h.orchestrator.start();

    const app = await submitApplication(h);
    const dead = await waitForState(h, app.id, 'failed');

    expect(h.analysis.script.calls).toBe(3);
    expect(dead.attempt).toBe(3);
    expect(dead.lastError).toBe('transient_network');
    expect(dead.statusReason).toBe(
      'Network error during analysis (attempt 3/3): connection reset; giving up after 3 attempts',
    );
    expect(await triggersOf(h, app.id)).toEqual(['stage_retry', 'stage_retry', 'stage_failed']);
  });

  test('rejected input fails without a retry', async () => {
    h = createHarness();
    h.tailoring.script.queue(failed('platform_rejected_input', 'Resume is empty'));
    await h.orchestrator.start();

    const app = await submitApplication(h);
    const dead = await waitForState(h, app.id, 'failed');

    expect(h.tailoring.script.calls).toBe(1);
    expect(dead.statusReason).toBe(
      'Platform rejected the input during tailoring (attempt 1/3): Resume is empty; not retryable',
    );
  });

  test('a missing submission executor fails the application', async () => {
    h = createHarness({ withoutSubmission: true });
    await h.orchestrator.start();

    const app = await submitApplication(h);
    const dead = await waitForState(h, app.id, 'failed');

    expect(dead.lastError).toBe('platform_rejected_input');
    expect(await triggersOf(h, app.id)).toEqual([
      'analysis_succeeded',
      'tailoring_succeeded',
      'auto_submit',
      'stage_failed',
    ]);
  });

  test('a stage past its deadline is abandoned and retried', async () => {
    h = createHarness({ settings: { stageTimeoutsMs: { analysis: 20 } } });
    h.analysis.script.queue(untilAborted());
    await h.orchestrator.start();

    const app = await submitApplication(h);
    await waitForState(h, app.id, 'confirmed');

    const { events } = await h.orchestrator.getStatus(app.id);
    expect(events[0]).toMatchObject({ trigger: 'stage_retry', lastError: 'timeout', attempt: 1 });
    expect(events[0]?.reason).toBe('Stage timed out during analysis (attempt 1/3): analysis did not finish within 20ms; retrying');
    expect(h.analysis.script.calls).toBe(2);
  });

  test('an executor that throws is classified and retried', async () => {
    h = createHarness();
    h.tailoring.script.queue(async () => {
      throw new Error('socket hang up');
    });
    await h.orchestrator.start();

    const app = await submitApplication(h);
    await waitForState(h, app.id, 'confirmed');

    const { events } = await h.orchestrator.getStatus(app.id);
    expect(events[1]).toMatchObject({ trigger: 'stage_retry', lastError: 'transient_network' });
  });

  // ── Resources ────────────────────────────────────────────────────────────

  test('platform concurrency limits hold one submission back until the other finishes', async () => {
    h = createHarness({ settings: { resources: { 'platform:greenhouse': { maxConcurrent: 1 } } } });
    h.submission.submitScript.queue(
      after(30, succeeded({ confirmationToken: 'CNF-A' })),
      after(30, succeeded({ confirmationToken: 'CNF-B' })),
    );
    await h.orchestrator.start();

    const a = await submitApplication(h, { sourceUrl: 'https://boards.greenhouse.io/acme/jobs/1' });
    const b = await submitApplication(h, { sourceUrl: 'https://boards.greenhouse.io/acme/jobs/2' });
    await waitForState(h, a.id, 'confirmed');
    await waitForState(h, b.id, 'confirmed');

    expect(h.submission.maxInFlight).toBe(1);
    expect(h.submission.submitScript.calls).toBe(2);
  });

  test('an exhausted platform budget leaves the application tailored and queued', async () => {
    h = createHarness({ settings: { resources: { 'platform:greenhouse': { capacity: 1 } } } });
    await h.orchestrator.start();

    const a = await submitApplication(h, { sourceUrl: 'https://boards.greenhouse.io/acme/jobs/1' });
    const b = await submitApplication(h, { sourceUrl: 'https://boards.greenhouse.io/acme/jobs/2' });

    await vi.waitFor(
      async () => {
        const states = await Promise.all([a.id, b.id].map(async (id) => (await h.repo.getApplication(id))?.state));
        expect(states.sort()).toEqual(['confirmed', 'tailored']);
        expect(h.orchestrator.stats().scheduler.active).toBe(0);
      },
      { timeout: 5_000, interval: 5 },
    );
    expect(h.submission.submitScript.calls).toBe(1);
    expect(h.orchestrator.stats().scheduler.queued).toBe(1);
  });

  // ── Exclusivity and cancellation ─────────────────────────────────────────

  test('a second dispatch for the same application is refused while one is in flight', async () => {
    h = createHarness();
    const app = await submitApplication(h);

    const results = await Promise.all([
      h.orchestrator.scheduler.dispatch(app.id),
      h.orchestrator.scheduler.dispatch(app.id),
    ]);

    expect(results).toEqual(['dispatched', 'in_flight']);
    expect(h.analysis.script.calls).toBe(1);
  });

  test('a claim held by another worker blocks dispatch', async () => {
    h = createHarness();
    const app = await submitApplication(h);
    await h.repo.claimDispatch(app.id, 'worker-other:1');

    expect(await h.orchestrator.scheduler.dispatch(app.id)).toBe('in_flight');
    expect(h.analysis.script.calls).toBe(0);
  });

  test('cancel during a running stage is applied when the stage returns', async () => {
    h = createHarness();
    const blocked = gate(succeeded(REQUIREMENTS));
    h.analysis.script.queue(blocked.step);
    const app = await submitApplication(h);

    const dispatched = h.orchestrator.scheduler.dispatch(app.id);
    await vi.waitFor(() => expect(h.analysis.script.calls).toBe(1));

    const pending = await h.orchestrator.cancel(app.id);
    expect(pending.status).toBe('pending');
    await expect(h.orchestrator.approve(app.id)).rejects.toThrow(ApplicationBusyError);

    blocked.release();
    expect(await dispatched).toBe('cancelled');

    const cancelled = await h.repo.getApplication(app.id);
    expect(cancelled?.state).toBe('cancelled');
    expect(cancelled?.statusReason).toBe('Cancelled while a stage was running');
    expect(await triggersOf(h, app.id)).toEqual(['analysis_succeeded', 'cancel']);
  });

  test('cancel of an idle application is immediate and a second cancel is illegal', async () => {
    h = createHarness();
    const app = await submitApplication(h);

    const result = await h.orchestrator.cancel(app.id);
    expect(result.status).toBe('cancelled');
    expect(result.application.state).toBe('cancelled');

    await expect(h.orchestrator.cancel(app.id)).rejects.toThrow(IllegalTransitionError);
    expect(await h.orchestrator.scheduler.dispatch(app.id)).toBe('terminal');
  });

  // ── Events ───────────────────────────────────────────────────────────────

  test('subscribers see every committed event in order', async () => {
    h = createHarness();
    const seen: string[] = [];
    h.orchestrator.subscribe((e) => seen.push(`${e.sequence}:${e.trigger}`));
    await h.orchestrator.start();

    const app = await submitApplication(h);
    await waitForState(h, app.id, 'confirmed');

    expect(seen).toEqual(['1:analysis_succeeded', '2:tailoring_succeeded', '3:auto_submit', '4:submission_confirmed']);
    expect((await h.orchestrator.eventsAfter(2)).map((e) => e.trigger)).toEqual([
      'auto_submit',
      'submission_confirmed',
    ]);
  });
});
