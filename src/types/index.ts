import type { LogLevel } from '../utils/logger';

// Core data types

export interface Account {
  id: number;
  displayName: string;
  remoteId: string;
}

export type NewAccount = Omit<Account, 'id'>;

/** One observation of an account's profile statistics. Immutable once stored. */
export interface Snapshot {
  owner: string;
  recordedAt: Date;
  rank: number;            // 0 = not extracted
  upload: string;          // unit-qualified, e.g. "12.34 TiB"
  currentUpload: string;
  currentDownload: string;
  points: number;
  seedingCount: number;
}

// Wire shape served by /api/profiles and /api/history
export interface ProfileResponse {
  owner: string;
  timestamp: string;
  rank: number;
  upload: string;
  current_upload: string;
  current_download: string;
  points: number;
  seeding_count: number;
}

export interface CycleSummary {
  startedAt: Date;
  finishedAt: Date;
  accounts: number;
  succeeded: number;
  failed: number;
  cancelled: boolean;
}

export interface Config {
  ncore: {
    nick: string;
    pass: string;
    baseUrl: string;
    timeoutMs: number;
  };
  database: {
    url: string;
  };
  app: {
    port: number;
    nodeEnv: string;
    logLevel: LogLevel;
    webDir: string;
    shutdownGraceMs: number;
  };
  ingestion: {
    intervalMs: number;
    pauseMs: number;
  };
}
