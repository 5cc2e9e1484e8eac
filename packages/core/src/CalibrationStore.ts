/**
 * @fileoverview Durable storage for the calibration record.
 *
 * The record is a small JSON document with exactly three numeric fields.
 * Reads never throw: a missing file means "not calibrated yet", and a corrupt
 * or invalid file is logged and treated the same way.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { z } from 'zod';
import { CALIBRATION } from './constants.js';
import { PersistenceUnavailableError } from './errors.js';
import { DEFAULT_CALIBRATION, deriveCalibration } from './HandCalibrator.js';
import type { Calibration } from './types.js';
import { createLogger } from './utils/logger.js';

const log = createLogger('calibration-store');

const CalibrationRecordSchema = z.object({
  handSpan: z.number().min(CALIBRATION.MIN_HAND_SPAN).max(CALIBRATION.MAX_HAND_SPAN),
  clickThreshold: z.number().int().min(CALIBRATION.CLICK_MIN).max(CALIBRATION.CLICK_MAX),
  exitThreshold: z.number().int().min(CALIBRATION.EXIT_MIN).max(CALIBRATION.EXIT_MAX),
});

export type CalibrationRecord = z.infer<typeof CalibrationRecordSchema>;

/**
 * Anything that can persist a freshly derived calibration.
 */
export interface CalibrationSink {
  save(calibration: Calibration): boolean;
}

export function toCalibrationRecord(calibration: Calibration): CalibrationRecord | null {
  if (!calibration.calibrated || calibration.handSpan === null) {
    return null;
  }
  return {
    handSpan: calibration.handSpan,
    clickThreshold: calibration.clickThreshold,
    exitThreshold: calibration.exitThreshold,
  };
}

export function fromCalibrationRecord(record: CalibrationRecord): Calibration {
  return Object.freeze({
    handSpan: record.handSpan,
    clickThreshold: record.clickThreshold,
    exitThreshold: record.exitThreshold,
    calibrated: true,
  });
}

/**
 * Parse the stored JSON text. The thresholds must be the ones the stored hand
 * span derives.
 * @throws {PersistenceUnavailableError} if the text is not a valid record
 */
export function parseCalibrationRecord(text: string, path: string): Calibration {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new PersistenceUnavailableError(path, `not valid JSON (${describe(error)})`);
  }
  const result = CalibrationRecordSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new PersistenceUnavailableError(path, issues);
  }
  const record = result.data;
  const expected = deriveCalibration(record.handSpan);
  if (
    record.clickThreshold !== expected.clickThreshold ||
    record.exitThreshold !== expected.exitThreshold
  ) {
    throw new PersistenceUnavailableError(
      path,
      `thresholds ${record.clickThreshold}/${record.exitThreshold} do not match hand span ` +
        `${record.handSpan} (expected ${expected.clickThreshold}/${expected.exitThreshold})`
    );
  }
  return fromCalibrationRecord(record);
}

/**
 * JSON file store for a single calibration record.
 */
export class CalibrationStore implements CalibrationSink {
  readonly path: string;

  constructor(path: string) {
    this.path = path;
  }

  /**
   * Load the stored calibration, or the uncalibrated defaults when there is
   * none or it cannot be read.
   */
  load(): Calibration {
    if (!existsSync(this.path)) {
      log.debug('No calibration file, using defaults', { path: this.path });
      return DEFAULT_CALIBRATION;
    }
    try {
      const calibration = this.read();
      log.info('Calibration loaded', {
        path: this.path,
        clickThreshold: calibration.clickThreshold,
        exitThreshold: calibration.exitThreshold,
      });
      return calibration;
    } catch (error) {
      log.warn('Failed to load calibration, using defaults', {
        path: this.path,
        error: describe(error),
      });
      return DEFAULT_CALIBRATION;
    }
  }

  /**
   * Read and validate the stored record.
   * @throws {PersistenceUnavailableError} if the file is missing, unreadable or invalid
   */
  read(): Calibration {
    let text: string;
    try {
      text = readFileSync(this.path, 'utf8');
    } catch (error) {
      throw new PersistenceUnavailableError(this.path, describe(error));
    }
    return parseCalibrationRecord(text, this.path);
  }

  /**
   * Write the calibration record. The previous record is only replaced once
   * the new one is fully written.
   * @returns false if the calibration is not calibrated or writing failed
   */
  save(calibration: Calibration): boolean {
    const record = toCalibrationRecord(calibration);
    if (!record) {
      log.warn('No calibration data to save');
      return false;
    }

    const tempPath = `${this.path}.tmp`;
    try {
      mkdirSync(dirname(this.path), { recursive: true });
      writeFileSync(tempPath, `${JSON.stringify(record, null, 2)}\n`, 'utf8');
      renameSync(tempPath, this.path);
      log.info('Calibration saved', { path: this.path });
      return true;
    } catch (error) {
      log.error('Failed to save calibration', { path: this.path, error: describe(error) });
      try {
        rmSync(tempPath, { force: true });
      } catch (cleanupError) {
        log.warn('Failed to remove temporary calibration file', {
          path: tempPath,
          error: describe(cleanupError),
        });
      }
      return false;
    }
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
