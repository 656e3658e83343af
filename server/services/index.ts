import type { ObjectStorage } from "../object-storage";
import type { IStorage } from "../storage";
import { AnswerRecorder } from "./answer-recorder";
import { AttemptReports } from "./attempt-reports";
import { AttemptSnapshotBuilder } from "./attempt-snapshot";
import { AttemptService } from "./attempts";
import { DraftPublishCoordinator } from "./draft-publish";
import { SnapshotStorageTier } from "./snapshot-storage";
import { TestCatalog } from "./test-catalog";

export interface ServiceOptions {
  answerWriteRetries: number;
  snapshotInlineThresholdBytes: number;
  now?: () => Date;
}

export interface Services {
  catalog: TestCatalog;
  drafts: DraftPublishCoordinator;
  snapshots: AttemptSnapshotBuilder;
  attempts: AttemptService;
  answers: AnswerRecorder;
  snapshotStorage: SnapshotStorageTier;
  reports: AttemptReports;
}

export function createServices(
  storage: IStorage,
  objectStorage: ObjectStorage | null,
  options: ServiceOptions,
): Services {
  const catalog = new TestCatalog(storage);
  const snapshots = new AttemptSnapshotBuilder(storage);

  return {
    catalog,
    drafts: new DraftPublishCoordinator(storage),
    snapshots,
    attempts: new AttemptService(storage, catalog, snapshots),
    answers: new AnswerRecorder(storage, { retries: options.answerWriteRetries, now: options.now }),
    snapshotStorage: new SnapshotStorageTier(storage, objectStorage, {
      inlineThresholdBytes: options.snapshotInlineThresholdBytes,
    }),
    reports: new AttemptReports(storage),
  };
}
