import fs from 'fs/promises';
import path from 'path';
import { serializeRecord } from '../pipeline/prescription.record';
import { PrescriptionRecord } from '../types/PrescriptionTypes';

export interface AuditWriter {
  write(record: PrescriptionRecord, originalName?: string): Promise<string>;
}

/** Dumps each returned record to `<dir>/<timestamp>-<file>-<id>.json`. */
export class FileAuditWriter implements AuditWriter {
  constructor(private readonly dir: string) {}

  async write(record: PrescriptionRecord, originalName?: string): Promise<string> {
    const safeName = (originalName || 'upload').replace(/[^a-z0-9]/gi, '_').toLowerCase();
    const timestamp = record.created_at.replace(/[:.]/g, '-');

    await fs.mkdir(this.dir, { recursive: true });
    const filePath = path.join(this.dir, `${timestamp}-${safeName}-${record.id}.json`);
    await fs.writeFile(filePath, JSON.stringify(serializeRecord(record), null, 2), 'utf8');
    return filePath;
  }
}
