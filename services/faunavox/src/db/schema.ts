import type { Database } from './client.js';

/**
 * Creates the pipeline tables if they do not already exist.
 *
 * `idx_analysis_jobs_one_active` is the cross-process half of the
 * one-active-job-per-artifact rule; the in-process lease table is the other.
 */
export async function initializeSchema(db: Database): Promise<{ initialized: boolean }> {
  await db.query(`
    create table if not exists audio_artifacts (
      id text primary key,
      owner_id text not null,
      species text not null,
      format text not null,
      size_bytes integer not null,
      storage_key text not null unique,
      status text not null,
      original_filename text null,
      location text null,
      recorded_at text null,
      uploaded_at text not null
    );
  `);
  await db.query(`
    create index if not exists idx_audio_artifacts_owner_uploaded
      on audio_artifacts (owner_id, uploaded_at desc);
  `);

  await db.query(`
    create table if not exists analysis_jobs (
      id text primary key,
      artifact_id text not null references audio_artifacts(id) on delete cascade,
      seq bigserial not null,
      status text not null,
      attempts integer not null default 0,
      quality json null,
      error_code text null,
      error_message text null,
      report json null,
      created_at text not null,
      updated_at text not null,
      finalized_at text null
    );
  `);
  await db.query(`
    create unique index if not exists idx_analysis_jobs_one_active
      on analysis_jobs (artifact_id)
      where status not in ('rejected', 'succeeded', 'partial', 'failed');
  `);
  await db.query(`
    create index if not exists idx_analysis_jobs_artifact_seq
      on analysis_jobs (artifact_id, seq desc);
  `);
  await db.query(`
    create index if not exists idx_analysis_jobs_status
      on analysis_jobs (status);
  `);

  await db.query(`
    create table if not exists analysis_results (
      job_id text primary key references analysis_jobs(id) on delete cascade,
      translation text null,
      tags jsonb not null,
      confidence double precision not null check (confidence >= 0 and confidence <= 1),
      quality_score double precision not null check (quality_score >= 0 and quality_score <= 1),
      partial boolean not null,
      finalized_at text not null
    );
  `);

  return { initialized: true };
}
