import { StageTransitionError } from '../common/errors';

/**
 * Pipeline stage of a site. Stages are strictly ordered:
 * discovered -> downloaded (has CSV) -> uploaded -> profiled.
 */
export enum SiteStage {
  Discovered = 'discovered',
  Downloaded = 'downloaded',
  Uploaded = 'uploaded',
  Profiled = 'profiled',
}

export const STAGE_ORDER: readonly SiteStage[] = [
  SiteStage.Discovered,
  SiteStage.Downloaded,
  SiteStage.Uploaded,
  SiteStage.Profiled,
];

/**
 * The stage columns of a site as stored.
 */
export interface StageColumns {
  stage: SiteStage;
  csvDownloadedOn: Date | null;
  uploadedOn: Date | null;
  profileUpdatedOn: Date | null;
}

/**
 * Legal combinations of stage and stage timestamps. A site cannot be
 * `profiled` without having been `uploaded`, and so on.
 */
export type SiteProgress =
  | { stage: SiteStage.Discovered }
  | { stage: SiteStage.Downloaded; csvDownloadedOn: Date }
  | { stage: SiteStage.Uploaded; csvDownloadedOn: Date; uploadedOn: Date }
  | {
      stage: SiteStage.Profiled;
      csvDownloadedOn: Date;
      uploadedOn: Date;
      profileUpdatedOn: Date;
    };

export function stageIndex(stage: SiteStage): number {
  return STAGE_ORDER.indexOf(stage);
}

export function isStageReached(
  columns: Pick<StageColumns, 'stage'>,
  stage: SiteStage,
): boolean {
  return stageIndex(columns.stage) >= stageIndex(stage);
}

/**
 * Read stored columns into a SiteProgress, rejecting illegal combinations.
 */
export function toSiteProgress(columns: StageColumns): SiteProgress {
  const { stage, csvDownloadedOn, uploadedOn, profileUpdatedOn } = columns;
  const missing = (field: string) =>
    new StageTransitionError(`Stage '${stage}' requires ${field} to be set`);

  switch (stage) {
    case SiteStage.Discovered:
      return { stage };
    case SiteStage.Downloaded:
      if (!csvDownloadedOn) throw missing('csvDownloadedOn');
      return { stage, csvDownloadedOn };
    case SiteStage.Uploaded:
      if (!csvDownloadedOn) throw missing('csvDownloadedOn');
      if (!uploadedOn) throw missing('uploadedOn');
      return { stage, csvDownloadedOn, uploadedOn };
    case SiteStage.Profiled:
      if (!csvDownloadedOn) throw missing('csvDownloadedOn');
      if (!uploadedOn) throw missing('uploadedOn');
      if (!profileUpdatedOn) throw missing('profileUpdatedOn');
      return { stage, csvDownloadedOn, uploadedOn, profileUpdatedOn };
  }
}

/**
 * Flatten a SiteProgress back into storable columns.
 */
export function toStageColumns(progress: SiteProgress): StageColumns {
  return {
    stage: progress.stage,
    csvDownloadedOn:
      progress.stage === SiteStage.Discovered ? null : progress.csvDownloadedOn,
    uploadedOn:
      progress.stage === SiteStage.Uploaded ||
      progress.stage === SiteStage.Profiled
        ? progress.uploadedOn
        : null,
    profileUpdatedOn:
      progress.stage === SiteStage.Profiled ? progress.profileUpdatedOn : null,
  };
}

/**
 * Mark `target` as completed at `at`.
 *
 * - target is the next stage: advance and stamp it
 * - target already reached: refresh its timestamp, stage unchanged
 * - target skips a stage: StageTransitionError
 *
 * Stages never move backwards.
 */
export function markStage(
  current: StageColumns,
  target: SiteStage,
  at: Date,
): StageColumns {
  const currentIndex = stageIndex(current.stage);
  const targetIndex = stageIndex(target);

  if (target === SiteStage.Discovered) {
    return { ...current };
  }
  if (targetIndex > currentIndex + 1) {
    throw new StageTransitionError(
      `Cannot mark '${target}' on a site in stage '${current.stage}'`,
    );
  }

  const next: StageColumns = {
    ...current,
    stage: targetIndex > currentIndex ? target : current.stage,
  };
  switch (target) {
    case SiteStage.Downloaded:
      next.csvDownloadedOn = at;
      break;
    case SiteStage.Uploaded:
      next.uploadedOn = at;
      break;
    case SiteStage.Profiled:
      next.profileUpdatedOn = at;
      break;
  }

  return toStageColumns(toSiteProgress(next));
}
