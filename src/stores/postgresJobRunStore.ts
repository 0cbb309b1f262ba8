import crypto from "node:crypto";
import type { JobRunRecord, JobRunStore } from "./interfaces";
import type { Sql } from "./postgresLibraryStore";

const JOB_RUN_STATUSES: JobRunRecord["status"][] = ["running", "succeeded", "failed"];

function toIso(value: unknown): string {
  if (value instanceof Date) return value.toISOString();
  return new Date(String(value)).toISOString();
}

export function toJobRunRecord(row: Record<string, unknown>): JobRunRecord {
  return {
    id: String(row.id ?? ""),
    jobName: String(row.job_name ?? ""),
    status: JOB_RUN_STATUSES.find((status) => status === row.status) ?? "failed",
    startedAt: toIso(row.started_at),
    completedAt: row.completed_at ? toIso(row.completed_at) : null,
    summary: row.summary ? String(row.summary) : null,
    errorMessage: row.error_message ? String(row.error_message) : null,
  };
}

export class PostgresJobRunStore implements JobRunStore {
  constructor(private readonly sql: Sql) {}

  async listRecentJobRuns(limit: number): Promise<JobRunRecord[]> {
    const bounded = Math.max(1, Math.min(limit, 500));
    const result = await this.sql(
      "SELECT id, job_name, status, started_at, completed_at, summary, error_message FROM library_job_runs ORDER BY started_at DESC LIMIT $1",
      [bounded]
    );
    return result.rows.map((row: Record<string, unknown>) => toJobRunRecord(row));
  }

  async startJobRun(jobName: string): Promise<JobRunRecord> {
    const id = crypto.randomUUID();
    const startedAt = new Date().toISOString();
    await this.sql(
      "INSERT INTO library_job_runs (id, job_name, status, started_at, completed_at, summary, error_message) VALUES ($1,$2,'running',$3::timestamptz,NULL,NULL,NULL)",
      [id, jobName, startedAt]
    );
    return { id, jobName, status: "running", startedAt, completedAt: null, summary: null, errorMessage: null };
  }

  async completeJobRun(id: string, summary: string): Promise<void> {
    await this.sql(
      "UPDATE library_job_runs SET status='succeeded', completed_at=now(), summary=$2, error_message=NULL WHERE id=$1",
      [id, summary]
    );
  }

  async failJobRun(id: string, errorMessage: string): Promise<void> {
    await this.sql("UPDATE library_job_runs SET status='failed', completed_at=now(), error_message=$2 WHERE id=$1", [
      id,
      errorMessage.slice(0, 4000),
    ]);
  }
}
