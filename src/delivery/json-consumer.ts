import { promises as fs } from 'node:fs';
import path from 'node:path';
import { describeError } from '../utils/errors';
import { toReportDocument } from './report-document';
import type { BriefingReport, DeliveryOutcome, ReportConsumer } from './types';

export function serializeReport(report: BriefingReport): string {
  return `${JSON.stringify(toReportDocument(report), null, 2)}\n`;
}

/**
 * Writes the report JSON to a file, creating parent directories
 */
export class JsonFileConsumer implements ReportConsumer {
  readonly channel = 'file';

  constructor(private readonly filePath: string) {}

  async deliver(report: BriefingReport): Promise<DeliveryOutcome> {
    const target = path.resolve(this.filePath);
    try {
      await fs.mkdir(path.dirname(target), { recursive: true });
      const tmp = `${target}.${process.pid}.tmp`;
      await fs.writeFile(tmp, serializeReport(report), 'utf-8');
      try {
        await fs.rename(tmp, target);
      } catch (error) {
        await fs.rm(tmp, { force: true });
        throw error;
      }
      return { channel: this.channel, success: true, location: target };
    } catch (error) {
      return { channel: this.channel, success: false, location: target, error: describeError(error) };
    }
  }
}

/**
 * Writes the report JSON to a stream (stdout by default)
 */
export class JsonStreamConsumer implements ReportConsumer {
  readonly channel = 'stdout';

  constructor(private readonly stream: NodeJS.WritableStream = process.stdout) {}

  deliver(report: BriefingReport): Promise<DeliveryOutcome> {
    return new Promise((resolve) => {
      this.stream.write(serializeReport(report), (error) => {
        resolve(
          error
            ? { channel: this.channel, success: false, error: describeError(error) }
            : { channel: this.channel, success: true }
        );
      });
    });
  }
}
