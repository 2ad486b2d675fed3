import { stat } from 'node:fs/promises';
import {
  buildRenderContext,
  errorMessage,
  extractTemplateTags,
  isDossierPlaceholder,
  renderTemplate,
  status,
  type FailureStage,
  type Logger
} from '@dossier/common';
import type { DossierRunOptions } from '@dossier/config';
import type { RequiredAgentField } from '@dossier/contracts';
import { LocalDiskProvider, buildDossierKey, failedBeforeWrite, type StorageProvider } from '@dossier/storage';
import { normalizePhoto as defaultNormalizePhoto, type PhotoNormalizer, type PhotoResult } from './photo-normalizer.js';
import type { LoadedRow } from './record-loader.js';

export type DossierBatchConfig = Pick<DossierRunOptions, 'photosDir' | 'outputDir' | 'escapeHtml'>;

export type DossierOutcome =
  | {
      status: typeof status.record.written;
      rowNumber: number;
      agent: string;
      path: string;
      sizeBytes: number;
      photo: PhotoResult['status'];
      warnings: string[];
    }
  | {
      status: typeof status.record.rejected;
      rowNumber: number;
      agent: string;
      missingFields: RequiredAgentField[];
      reason: string;
    }
  | {
      status: typeof status.record.failed;
      rowNumber: number;
      agent: string;
      stage: FailureStage;
      reason: string;
    };

export interface BatchSummary {
  total: number;
  written: number;
  rejected: number;
  failed: number;
  warnings: number;
  outcomes: DossierOutcome[];
}

export interface ProcessDossierBatchParams {
  rows: readonly LoadedRow[];
  template: string;
  config: DossierBatchConfig;
  logger: Logger;
  storage?: StorageProvider;
  normalizePhoto?: PhotoNormalizer;
  clock?: () => Date;
}

const describePhotoMiss = (photo: Extract<PhotoResult, { status: 'missing' }>): string => {
  switch (photo.reason) {
    case 'not_found':
      return `no photo at ${photo.expectedPath}`;
    case 'unreadable':
      return `photo at ${photo.expectedPath} is unreadable: ${photo.error ?? 'unknown'}`;
    case 'decode_failed':
      return `photo at ${photo.expectedPath} could not be decoded: ${photo.error ?? 'unknown'}`;
  }
};

const isDirectory = async (dir: string): Promise<boolean> => {
  try {
    return (await stat(dir)).isDirectory();
  } catch {
    return false;
  }
};

export const summarizeOutcomes = (outcomes: DossierOutcome[]): BatchSummary => ({
  total: outcomes.length,
  written: outcomes.filter((o) => o.status === status.record.written).length,
  rejected: outcomes.filter((o) => o.status === status.record.rejected).length,
  failed: outcomes.filter((o) => o.status === status.record.failed).length,
  warnings: outcomes.reduce((count, o) => count + (o.status === status.record.written ? o.warnings.length : 0), 0),
  outcomes
});

/**
 * Renders one dossier per valid row, strictly in input order. Nothing a single record does
 * can stop the batch: rejections and failures become outcomes.
 */
export const processDossierBatch = async ({
  rows,
  template,
  config,
  logger,
  storage = new LocalDiskProvider({ rootDir: config.outputDir }),
  normalizePhoto = defaultNormalizePhoto,
  clock = () => new Date()
}: ProcessDossierBatchParams): Promise<BatchSummary> => {
  const batchStartMs = Date.now();
  const outcomes: DossierOutcome[] = [];
  const writtenKeys = new Map<string, string>();

  logger.info('dossier_batch_start', {
    rows: rows.length,
    photos_dir: config.photosDir,
    output_dir: config.outputDir,
    escape_html: config.escapeHtml
  });

  if (!(await isDirectory(config.photosDir))) {
    logger.warn('dossier_photos_dir_missing', {
      photos_dir: config.photosDir,
      hint: 'dossiers will be created without photos'
    });
  }

  const unknownTags = extractTemplateTags(template).filter((tag) => !isDossierPlaceholder(tag));
  if (unknownTags.length > 0) {
    logger.warn('dossier_placeholder_unresolved', {
      unresolved_count: unknownTags.length,
      examples: unknownTags.slice(0, 5)
    });
  }

  for (const row of rows) {
    if (row.status === 'invalid') {
      const reason = `missing ${row.missingFields.join(', ')}`;
      outcomes.push({
        status: status.record.rejected,
        rowNumber: row.rowNumber,
        agent: row.label,
        missingFields: row.missingFields,
        reason
      });
      logger.warn('dossier_record_rejected', {
        row_number: row.rowNumber,
        agent: row.label,
        missing_fields: row.missingFields
      });
      continue;
    }

    const { record, rowNumber } = row;
    const agent = record.Name;
    const warnings: string[] = [];

    const trace = (state: (typeof status.record)[keyof typeof status.record]): void =>
      logger.debug('dossier_record_state', { row_number: rowNumber, agent, state });

    trace(status.record.validated);

    const fail = (stage: FailureStage, error: unknown): void => {
      const reason = errorMessage(error);
      outcomes.push({ status: status.record.failed, rowNumber, agent, stage, reason });
      logger.error('dossier_record_failed', { row_number: rowNumber, agent, stage, error: reason });
    };

    let photo: PhotoResult;
    try {
      photo = await normalizePhoto(agent, config.photosDir);
    } catch (error) {
      fail(status.failureStage.photo, error);
      continue;
    }

    trace(status.record.photoResolved);

    if (photo.status === 'missing') {
      const warning = describePhotoMiss(photo);
      warnings.push(warning);
      logger.warn('dossier_photo_missing', {
        row_number: rowNumber,
        agent,
        reason: photo.reason,
        expected_path: photo.expectedPath
      });
    }

    let html: string;
    try {
      const context = buildRenderContext(record, photo, { escapeHtml: config.escapeHtml, now: clock() });
      html = renderTemplate(template, context).html;
    } catch (error) {
      fail(status.failureStage.render, error);
      continue;
    }

    trace(status.record.rendered);

    const key = buildDossierKey(agent);
    const previousOwner = writtenKeys.get(key);
    if (previousOwner !== undefined) {
      warnings.push(`overwrote the dossier of "${previousOwner}" (same file name ${key})`);
      logger.warn('dossier_filename_collision', {
        row_number: rowNumber,
        key,
        agent,
        previous_agent: previousOwner
      });
    }

    try {
      const written = await storage.putObject({ key, body: html });
      writtenKeys.set(key, agent);
      outcomes.push({
        status: status.record.written,
        rowNumber,
        agent,
        path: written.path,
        sizeBytes: written.sizeBytes,
        photo: photo.status,
        warnings
      });
      logger.info('dossier_record_written', {
        row_number: rowNumber,
        agent,
        path: written.path,
        size_bytes: written.sizeBytes,
        photo: photo.status
      });
    } catch (error) {
      fail(status.failureStage.write, error);
      // A partial file must not pass for a finished dossier. An open failure wrote nothing.
      if (previousOwner === undefined && !failedBeforeWrite(error)) {
        try {
          await storage.deleteObject({ key });
        } catch (cleanupError) {
          logger.error('dossier_cleanup_failed', { row_number: rowNumber, key, error: errorMessage(cleanupError) });
        }
      }
    }
  }

  const summary = summarizeOutcomes(outcomes);

  logger.info('dossier_batch_summary', {
    total: summary.total,
    written: summary.written,
    rejected: summary.rejected,
    failed: summary.failed,
    warnings: summary.warnings,
    duration_ms: Date.now() - batchStartMs
  });

  return summary;
};
