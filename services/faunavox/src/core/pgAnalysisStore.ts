import type { Database } from '../db/client.js';
import type {
  AnalysisJobRecord,
  AnalysisReport,
  AudioArtifactRecord,
  AudioFormat,
  PipelineStatus,
  QualityVerdict,
} from '../types/analysis.js';
import type {
  AnalysisStore,
  CreateJobOutcome,
  FinalizeInput,
  JobStats,
  TransitionInput,
} from './analysisStore.js';
import { assertTransition } from './stateMachine.js';

interface ArtifactRow {
  id: string;
  owner_id: string;
  species: string;
  format: AudioFormat;
  size_bytes: number;
  storage_key: string;
  status: PipelineStatus;
  original_filename: string | null;
  location: string | null;
  recorded_at: string | null;
  uploaded_at: string;
}

interface JobRow {
  id: string;
  artifact_id: string;
  status: PipelineStatus;
  attempts: number;
  quality: QualityVerdict | null;
  error_code: string | null;
  error_message: string | null;
  report: AnalysisReport | null;
  created_at: string;
  updated_at: string;
  finalized_at: string | null;
}

const TERMINAL_SQL = `('rejected', 'succeeded', 'partial', 'failed')`;

function toArtifact(row: ArtifactRow): AudioArtifactRecord {
  return {
    id: row.id,
    owner_id: row.owner_id,
    species: row.species,
    format: row.format,
    size_bytes: row.size_bytes,
    storage_key: row.storage_key,
    uploaded_at: row.uploaded_at,
    status: row.status,
    original_filename: row.original_filename || undefined,
    location: row.location || undefined,
    recorded_at: row.recorded_at || undefined,
  };
}

function toJob(row: JobRow): AnalysisJobRecord {
  return {
    id: row.id,
    artifact_id: row.artifact_id,
    status: row.status,
    attempts: row.attempts,
    created_at: row.created_at,
    updated_at: row.updated_at,
    quality: row.quality,
    error:
      row.error_code && row.error_message
        ? {
            code: row.error_code,
            message: row.error_message,
          }
        : null,
    finalized_at: row.finalized_at,
  };
}

export class PgAnalysisStore implements AnalysisStore {
  readonly name = 'postgres';

  constructor(private readonly db: Database) {}

  async createArtifact(record: AudioArtifactRecord): Promise<void> {
    await this.db.query(
      `
        insert into audio_artifacts (
          id, owner_id, species, format, size_bytes, storage_key, status,
          original_filename, location, recorded_at, uploaded_at
        )
        values ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)
      `,
      [
        record.id,
        record.owner_id,
        record.species,
        record.format,
        record.size_bytes,
        record.storage_key,
        record.status,
        record.original_filename ?? null,
        record.location ?? null,
        record.recorded_at ?? null,
        record.uploaded_at,
      ],
    );
  }

  async getArtifact(id: string): Promise<AudioArtifactRecord | undefined> {
    const rows = await this.db.query<ArtifactRow>(
      `
        select *
        from audio_artifacts
        where id = $1
        limit 1
      `,
      [id],
    );
    return rows[0] ? toArtifact(rows[0]) : undefined;
  }

  async createJobIfIdle(artifactId: string, jobId: string, now: string): Promise<CreateJobOutcome> {
    return this.db.withTransaction(async (client) => {
      const inserted = await client.query<JobRow>(
        `
          insert into analysis_jobs (id, artifact_id, status, attempts, created_at, updated_at)
          values ($1, $2, 'uploaded', 0, $3, $3)
          on conflict (artifact_id) where status not in ${TERMINAL_SQL} do nothing
          returning *
        `,
        [jobId, artifactId, now],
      );

      if (inserted.rows[0]) {
        await client.query(`update audio_artifacts set status = 'uploaded' where id = $1`, [artifactId]);
        return { job: toJob(inserted.rows[0]), created: true };
      }

      const active = await client.query<JobRow>(
        `
          select *
          from analysis_jobs
          where artifact_id = $1 and status not in ${TERMINAL_SQL}
          limit 1
        `,
        [artifactId],
      );
      if (!active.rows[0]) {
        throw new Error(`Active job for artifact ${artifactId} vanished during admission`);
      }
      return { job: toJob(active.rows[0]), created: false };
    });
  }

  async getJob(id: string): Promise<AnalysisJobRecord | undefined> {
    const rows = await this.db.query<JobRow>(
      `
        select *
        from analysis_jobs
        where id = $1
        limit 1
      `,
      [id],
    );
    return rows[0] ? toJob(rows[0]) : undefined;
  }

  async findActiveJob(artifactId: string): Promise<AnalysisJobRecord | undefined> {
    const rows = await this.db.query<JobRow>(
      `
        select *
        from analysis_jobs
        where artifact_id = $1 and status not in ${TERMINAL_SQL}
        limit 1
      `,
      [artifactId],
    );
    return rows[0] ? toJob(rows[0]) : undefined;
  }

  async findLatestJob(artifactId: string): Promise<AnalysisJobRecord | undefined> {
    const rows = await this.db.query<JobRow>(
      `
        select *
        from analysis_jobs
        where artifact_id = $1
        order by seq desc
        limit 1
      `,
      [artifactId],
    );
    return rows[0] ? toJob(rows[0]) : undefined;
  }

  async transition(input: TransitionInput): Promise<AnalysisJobRecord | undefined> {
    assertTransition(input.from, input.to);
    return this.db.withTransaction(async (client) => {
      const rows = await client.query<JobRow>(
        `
          update analysis_jobs
          set
            status = $3,
            updated_at = $4,
            quality = coalesce($5::json, quality)
          where id = $1 and status = $2
          returning *
        `,
        [input.jobId, input.from, input.to, input.now, input.quality ? JSON.stringify(input.quality) : null],
      );
      const row = rows.rows[0];
      if (!row) return undefined;

      await client.query(`update audio_artifacts set status = $2 where id = $1`, [row.artifact_id, row.status]);
      return toJob(row);
    });
  }

  async beginAttempt(jobId: string, expectedAttempts: number, now: string): Promise<number | null> {
    const rows = await this.db.query<{ attempts: number }>(
      `
        update analysis_jobs
        set attempts = attempts + 1, updated_at = $3
        where id = $1 and status = 'dispatched' and attempts = $2
        returning attempts
      `,
      [jobId, expectedAttempts, now],
    );
    return rows[0] ? rows[0].attempts : null;
  }

  async finalize(input: FinalizeInput): Promise<AnalysisJobRecord | undefined> {
    const { report } = input;
    assertTransition(input.from, report.status);

    return this.db.withTransaction(async (client) => {
      const rows = await client.query<JobRow>(
        `
          update analysis_jobs
          set
            status = $3,
            error_code = $4,
            error_message = $5,
            quality = coalesce($6::json, quality),
            report = $7::json,
            updated_at = $8,
            finalized_at = $8
          where id = $1
            and status = $2
            and ($9::integer is null or attempts = $9)
          returning *
        `,
        [
          input.jobId,
          input.from,
          report.status,
          input.error?.code ?? null,
          input.error?.message ?? null,
          report.quality ? JSON.stringify(report.quality) : null,
          JSON.stringify(report),
          report.finalized_at,
          input.expectedAttempts ?? null,
        ],
      );
      const row = rows.rows[0];
      if (!row) return undefined;

      if (input.result) {
        await client.query(
          `
            insert into analysis_results (
              job_id, translation, tags, confidence, quality_score, partial, finalized_at
            )
            values ($1, $2, $3::jsonb, $4, $5, $6, $7)
          `,
          [
            input.result.job_id,
            input.result.translation,
            JSON.stringify(input.result.tags),
            input.result.confidence,
            input.result.quality.score,
            input.result.partial,
            input.result.finalized_at,
          ],
        );
      }

      await client.query(`update audio_artifacts set status = $2 where id = $1`, [row.artifact_id, row.status]);
      return toJob(row);
    });
  }

  async getLatestReport(artifactId: string): Promise<AnalysisReport | undefined> {
    const rows = await this.db.query<{ report: AnalysisReport }>(
      `
        select report
        from analysis_jobs
        where artifact_id = $1 and report is not null
        order by seq desc
        limit 1
      `,
      [artifactId],
    );
    return rows[0]?.report;
  }

  async stats(): Promise<JobStats> {
    const rows = await this.db.query<{ status: PipelineStatus; count: string }>(`
      select status, count(*)::text as count
      from analysis_jobs
      group by status
    `);

    const counts: JobStats = {
      total: 0,
      uploaded: 0,
      quality_checked: 0,
      rejected: 0,
      dispatched: 0,
      succeeded: 0,
      partial: 0,
      failed: 0,
    };
    for (const row of rows) {
      const count = Number.parseInt(row.count || '0', 10);
      counts[row.status] += count;
      counts.total += count;
    }
    return counts;
  }

  async close(): Promise<void> {
    await this.db.close();
  }
}
