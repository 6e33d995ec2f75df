import { readFile } from 'fs/promises';
import * as path from 'path';
import { ZodError } from 'zod';
import { config } from '../config/env';
import { logger } from '../utils/logger';
import { parseDashboardData, type DashboardData } from './schema';

export interface DashboardDataSource {
  load(): Promise<DashboardData>;
}

export class DashboardDataError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'DashboardDataError';
  }
}

function summarizeZodError(err: ZodError): string {
  return err.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
}

/**
 * Reads the dashboard snapshot from a JSON file on every load, so an external
 * job can rewrite the file without restarting the service.
 */
export class JsonFileDataSource implements DashboardDataSource {
  readonly filePath: string;

  constructor(filePath: string = config.dashboard.dataPath) {
    this.filePath = path.resolve(filePath);
  }

  async load(): Promise<DashboardData> {
    let text: string;
    try {
      text = await readFile(this.filePath, 'utf-8');
    } catch (err) {
      throw new DashboardDataError(`Cannot read dashboard data at ${this.filePath}`, err);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (err) {
      throw new DashboardDataError(`Dashboard data at ${this.filePath} is not valid JSON`, err);
    }

    try {
      return parseDashboardData(raw);
    } catch (err) {
      if (err instanceof ZodError) {
        const summary = summarizeZodError(err);
        logger.warn('Dashboard data failed validation', { file: this.filePath, issues: err.issues.length });
        throw new DashboardDataError(`Invalid dashboard data: ${summary}`, err);
      }
      throw err;
    }
  }
}

/** Fixed data, validated once. */
export class StaticDataSource implements DashboardDataSource {
  private readonly data: DashboardData;

  constructor(raw: unknown) {
    this.data = parseDashboardData(raw);
  }

  async load(): Promise<DashboardData> {
    return this.data;
  }
}
