import type { QueryResult, QueryResultRow } from 'pg';
import type {
  Application,
  ApplicationEvent,
  ApplicationOutcome,
  ApplicationState,
  AutomationLevel,
  EventCause,
  FailureKind,
  Job,
  Requirements,
  Resume,
  ResumeLineage,
  TailoringMode,
} from '../lifecycle/types.js';
import type { Platform } from '../config/resources.js';
import type {
  ApplicationFilter,
  CommitTransitionInput,
  InsertApplicationResult,
  Repository,
} from './types.js';

/** The part of a pg client the repository uses; `pg.PoolClient` satisfies it. */
export interface SqlClient {
  query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>;
  release(err?: Error | boolean): void;
}

/** The part of a pg pool the repository uses; `pg.Pool` satisfies it. */
export interface SqlPool {
  query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>;
  connect(): Promise<SqlClient>;
}

// --- Row shapes ---

type JobRow = {
  id: string;
  source_url: string;
  platform: Platform;
  title: string;
  company: string;
  posting_text: string;
  requirements: Requirements | null;
  created_at: Date;
};

type ResumeRow = {
  id: string;
  candidate_id: string;
  parent_id: string | null;
  tailoring_mode: TailoringMode | null;
  content: string;
  lineage: ResumeLineage | null;
  created_at: Date;
};

type ApplicationRow = {
  id: string;
  job_id: string;
  candidate_id: string;
  base_resume_id: string;
  resume_id: string;
  tailoring_mode: TailoringMode;
  automation_level: AutomationLevel;
  state: ApplicationState;
  attempt: number;
  last_error: FailureKind | null;
  status_reason: string | null;
  confirmation_token: string | null;
  submitted_at: Date | null;
  outcome: ApplicationOutcome | null;
  // NUMERIC comes back as a string
  match_score: string | null;
  version: number;
  created_at: Date;
  updated_at: Date;
};

type EventRow = {
  // BIGSERIAL comes back as a string
  position: string;
  id: string;
  application_id: string;
  job_id: string;
  sequence: number;
  from_state: ApplicationState;
  to_state: ApplicationState;
  trigger: string;
  cause: EventCause;
  attempt: number;
  last_error: FailureKind | null;
  reason: string | null;
  resume_id: string;
  confirmation_token: string | null;
  outcome: ApplicationOutcome | null;
  match_score: string | null;
  occurred_at: Date;
};

function jobFromRow(row: JobRow): Job {
  return {
    id: row.id,
    sourceUrl: row.source_url,
    platform: row.platform,
    title: row.title,
    company: row.company,
    postingText: row.posting_text,
    requirements: row.requirements,
    createdAt: row.created_at.toISOString(),
  };
}

function resumeFromRow(row: ResumeRow): Resume {
  return {
    id: row.id,
    candidateId: row.candidate_id,
    parentId: row.parent_id,
    tailoringMode: row.tailoring_mode,
    content: row.content,
    lineage: row.lineage,
    createdAt: row.created_at.toISOString(),
  };
}

function applicationFromRow(row: ApplicationRow): Application {
  return {
    id: row.id,
    jobId: row.job_id,
    candidateId: row.candidate_id,
    baseResumeId: row.base_resume_id,
    resumeId: row.resume_id,
    tailoringMode: row.tailoring_mode,
    automationLevel: row.automation_level,
    state: row.state,
    attempt: row.attempt,
    lastError: row.last_error,
    statusReason: row.status_reason,
    confirmationToken: row.confirmation_token,
    submittedAt: row.submitted_at === null ? null : row.submitted_at.toISOString(),
    outcome: row.outcome,
    matchScore: row.match_score === null ? null : Number(row.match_score),
    version: row.version,
    createdAt: row.created_at.toISOString(),
    updatedAt: row.updated_at.toISOString(),
  };
}

function eventFromRow(row: EventRow): ApplicationEvent {
  return {
    id: row.id,
    applicationId: row.application_id,
    jobId: row.job_id,
    sequence: row.sequence,
    position: Number(row.position),
    fromState: row.from_state,
    toState: row.to_state,
    trigger: row.trigger,
    cause: row.cause,
    attempt: row.attempt,
    lastError: row.last_error,
    reason: row.reason,
    resumeId: row.resume_id,
    confirmationToken: row.confirmation_token,
    outcome: row.outcome,
    matchScore: row.match_score === null ? null : Number(row.match_score),
    occurredAt: row.occurred_at.toISOString(),
  };
}

const APPLICATION_COLUMNS = `id, job_id, candidate_id, base_resume_id, resume_id, tailoring_mode,
  automation_level, state, attempt, last_error, status_reason, confirmation_token, submitted_at,
  outcome, match_score, version, created_at, updated_at`;

function applicationParams(app: Application): unknown[] {
  return [
    app.id,
    app.jobId,
    app.candidateId,
    app.baseResumeId,
    app.resumeId,
    app.tailoringMode,
    app.automationLevel,
    app.state,
    app.attempt,
    app.lastError,
    app.statusReason,
    app.confirmationToken,
    app.submittedAt,
    app.outcome,
    app.matchScore,
    app.version,
    app.createdAt,
    app.updatedAt,
  ];
}

export interface PgRepositoryOptions {
  pool: SqlPool;
  /** Table name prefix, matching the one the migrations ran with */
  tablePrefix?: string;
}

/**
 * PostgreSQL repository. Transitions run in a single transaction: the
 * projection UPDATE is conditional on (state, version) and the event INSERT
 * only happens when it matched.
 *
 * Event inserts take a transaction-scoped advisory lock first, so positions
 * are handed out in commit order and `listEventsAfter` never skips an event
 * that commits late.
 */
export class PgRepository implements Repository {
  private readonly pool: SqlPool;
  private readonly t: { jobs: string; resumes: string; applications: string; events: string };

  constructor(opts: PgRepositoryOptions) {
    this.pool = opts.pool;
    const prefix = opts.tablePrefix ?? 'af_';
    this.t = {
      jobs: `${prefix}jobs`,
      resumes: `${prefix}resumes`,
      applications: `${prefix}applications`,
      events: `${prefix}application_events`,
    };
  }

  // --- Jobs ---

  async putJob(job: Job): Promise<void> {
    await this.pool.query(
      `INSERT INTO ${this.t.jobs} (id, source_url, platform, title, company, posting_text, requirements, created_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
       ON CONFLICT DO NOTHING`,
      [
        job.id,
        job.sourceUrl,
        job.platform,
        job.title,
        job.company,
        job.postingText,
        job.requirements === null ? null : JSON.stringify(job.requirements),
        job.createdAt,
      ],
    );
  }

  async getJob(id: string): Promise<Job | null> {
    const { rows } = await this.pool.query<JobRow>(`SELECT * FROM ${this.t.jobs} WHERE id = $1`, [id]);
    return rows[0] ? jobFromRow(rows[0]) : null;
  }

  async findJobBySourceUrl(sourceUrl: string): Promise<Job | null> {
    const { rows } = await this.pool.query<JobRow>(`SELECT * FROM ${this.t.jobs} WHERE source_url = $1`, [
      sourceUrl,
    ]);
    return rows[0] ? jobFromRow(rows[0]) : null;
  }

  async setJobRequirements(jobId: string, requirements: Requirements): Promise<Requirements> {
    const updated = await this.pool.query<Pick<JobRow, 'requirements'>>(
      `UPDATE ${this.t.jobs} SET requirements = $2
       WHERE id = $1 AND requirements IS NULL
       RETURNING requirements`,
      [jobId, JSON.stringify(requirements)],
    );
    const written = updated.rows[0]?.requirements;
    if (written) return written;

    const existing = await this.pool.query<Pick<JobRow, 'requirements'>>(
      `SELECT requirements FROM ${this.t.jobs} WHERE id = $1`,
      [jobId],
    );
    const stored = existing.rows[0]?.requirements;
    if (!stored) throw new Error(`Job not found: ${jobId}`);
    return stored;
  }

  // --- Resumes ---

  async putResume(resume: Resume): Promise<void> {
    await this.pool.query(
      `INSERT INTO ${this.t.resumes} (id, candidate_id, parent_id, tailoring_mode, content, lineage, created_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7)
       ON CONFLICT (id) DO NOTHING`,
      [
        resume.id,
        resume.candidateId,
        resume.parentId,
        resume.tailoringMode,
        resume.content,
        resume.lineage === null ? null : JSON.stringify(resume.lineage),
        resume.createdAt,
      ],
    );
  }

  async getResume(id: string): Promise<Resume | null> {
    const { rows } = await this.pool.query<ResumeRow>(`SELECT * FROM ${this.t.resumes} WHERE id = $1`, [id]);
    return rows[0] ? resumeFromRow(rows[0]) : null;
  }

  // --- Applications ---

  async insertApplication(application: Application): Promise<InsertApplicationResult> {
    const inserted = await this.pool.query<ApplicationRow>(
      `INSERT INTO ${this.t.applications} (${APPLICATION_COLUMNS})
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15, $16, $17, $18)
       ON CONFLICT (job_id, candidate_id) WHERE state NOT IN ('failed', 'cancelled') DO NOTHING
       RETURNING ${APPLICATION_COLUMNS}`,
      applicationParams(application),
    );
    if (inserted.rows[0]) {
      return { application: applicationFromRow(inserted.rows[0]), created: true };
    }

    const existing = await this.pool.query<ApplicationRow>(
      `SELECT ${APPLICATION_COLUMNS} FROM ${this.t.applications}
       WHERE job_id = $1 AND candidate_id = $2 AND state NOT IN ('failed', 'cancelled')`,
      [application.jobId, application.candidateId],
    );
    if (!existing.rows[0]) {
      throw new Error(`Application insert for job ${application.jobId} conflicted but no active row was found`);
    }
    return { application: applicationFromRow(existing.rows[0]), created: false };
  }

  async getApplication(id: string): Promise<Application | null> {
    const { rows } = await this.pool.query<ApplicationRow>(
      `SELECT ${APPLICATION_COLUMNS} FROM ${this.t.applications} WHERE id = $1`,
      [id],
    );
    return rows[0] ? applicationFromRow(rows[0]) : null;
  }

  async listApplications(filter: ApplicationFilter = {}): Promise<Application[]> {
    const result = filter.states
      ? await this.pool.query<ApplicationRow>(
          `SELECT ${APPLICATION_COLUMNS} FROM ${this.t.applications} WHERE state = ANY($1) ORDER BY created_at`,
          [filter.states],
        )
      : await this.pool.query<ApplicationRow>(
          `SELECT ${APPLICATION_COLUMNS} FROM ${this.t.applications} ORDER BY created_at`,
        );
    return result.rows.map(applicationFromRow);
  }

  async putApplication(application: Application): Promise<void> {
    await this.pool.query(
      `UPDATE ${this.t.applications}
       SET resume_id = $2, state = $3, attempt = $4, last_error = $5, status_reason = $6,
           confirmation_token = $7, submitted_at = $8, outcome = $9, match_score = $10,
           version = $11, updated_at = $12
       WHERE id = $1`,
      [
        application.id,
        application.resumeId,
        application.state,
        application.attempt,
        application.lastError,
        application.statusReason,
        application.confirmationToken,
        application.submittedAt,
        application.outcome,
        application.matchScore,
        application.version,
        application.updatedAt,
      ],
    );
  }

  // --- Transitions ---

  async commitTransition(input: CommitTransitionInput): Promise<ApplicationEvent | null> {
    const { application: app, event } = input;
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');

      const updated = await client.query(
        `UPDATE ${this.t.applications}
         SET state = $2, attempt = $3, last_error = $4, status_reason = $5, resume_id = $6,
             confirmation_token = $7, submitted_at = $8, outcome = $9, match_score = $10,
             version = $11, updated_at = $12
         WHERE id = $1 AND state = $13 AND version = $14`,
        [
          app.id,
          app.state,
          app.attempt,
          app.lastError,
          app.statusReason,
          app.resumeId,
          app.confirmationToken,
          app.submittedAt,
          app.outcome,
          app.matchScore,
          app.version,
          app.updatedAt,
          input.expectedState,
          input.expectedVersion,
        ],
      );
      if ((updated.rowCount ?? 0) === 0) {
        await client.query('ROLLBACK');
        return null;
      }

      // Held until COMMIT: the next transaction draws its position only after this one is visible
      await client.query('SELECT pg_advisory_xact_lock(hashtext($1))', [this.t.events]);
      const inserted = await client.query<EventRow>(
        `INSERT INTO ${this.t.events} (id, application_id, job_id, sequence, from_state, to_state, trigger,
           cause, attempt, last_error, reason, resume_id, confirmation_token, outcome, match_score, occurred_at)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15, $16)
         RETURNING *`,
        [
          event.id,
          event.applicationId,
          event.jobId,
          event.sequence,
          event.fromState,
          event.toState,
          event.trigger,
          event.cause,
          event.attempt,
          event.lastError,
          event.reason,
          event.resumeId,
          event.confirmationToken,
          event.outcome,
          event.matchScore,
          event.occurredAt,
        ],
      );
      const row = inserted.rows[0];
      if (!row) throw new Error(`Event insert for ${app.id} returned no row`);

      await client.query('COMMIT');
      return eventFromRow(row);
    } catch (err) {
      await client.query('ROLLBACK');
      throw err;
    } finally {
      client.release();
    }
  }

  async listEvents(applicationId: string): Promise<ApplicationEvent[]> {
    const { rows } = await this.pool.query<EventRow>(
      `SELECT * FROM ${this.t.events} WHERE application_id = $1 ORDER BY sequence`,
      [applicationId],
    );
    return rows.map(eventFromRow);
  }

  async listEventsAfter(position: number, limit: number): Promise<ApplicationEvent[]> {
    const { rows } = await this.pool.query<EventRow>(
      `SELECT * FROM ${this.t.events} WHERE position > $1 ORDER BY position LIMIT $2`,
      [position, limit],
    );
    return rows.map(eventFromRow);
  }

  // --- Dispatch claims ---

  async claimDispatch(applicationId: string, token: string): Promise<boolean> {
    const result = await this.pool.query(
      `UPDATE ${this.t.applications}
       SET dispatch_token = $2, dispatch_claimed_at = now()
       WHERE id = $1 AND (dispatch_token IS NULL OR dispatch_token = $2)`,
      [applicationId, token],
    );
    return (result.rowCount ?? 0) > 0;
  }

  async releaseDispatch(applicationId: string, token: string): Promise<void> {
    await this.pool.query(
      `UPDATE ${this.t.applications}
       SET dispatch_token = NULL, dispatch_claimed_at = NULL
       WHERE id = $1 AND dispatch_token = $2`,
      [applicationId, token],
    );
  }

  async clearDispatchClaims(workerId: string): Promise<string[]> {
    const { rows } = await this.pool.query<{ id: string }>(
      `UPDATE ${this.t.applications}
       SET dispatch_token = NULL, dispatch_claimed_at = NULL
       WHERE dispatch_token LIKE $1
       RETURNING id`,
      [`${workerId}:%`],
    );
    return rows.map((r) => r.id);
  }
}
