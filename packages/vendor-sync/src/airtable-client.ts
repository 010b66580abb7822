/**
 * Thin wrapper over the Airtable SDK for one base.
 * Records come back as `{ id, fields }` with the raw field map; decoding is
 * left to map-from-airtable.
 */
import Airtable, { type FieldSet } from 'airtable';
import { createLogger, type AirtableRecord } from '@bizops/shared';

const log = createLogger('airtable-client', 'at');

export type AirtableFields = Partial<FieldSet>;

export class AirtableClient {
  private readonly base: ReturnType<Airtable['base']>;

  constructor(
    apiKey: string,
    private readonly baseId: string
  ) {
    this.base = new Airtable({ apiKey }).base(baseId);
  }

  /** List every record in a table view (the SDK follows pagination). */
  async listRecords(table: string, view: string): Promise<AirtableRecord[]> {
    const records = await this.base(table).select({ view }).all();
    log.info({ baseId: this.baseId, table, view, count: records.length }, 'Listed records');
    return records.map((r) => ({ id: r.id, fields: r.fields }));
  }

  async getRecord(table: string, recordId: string): Promise<AirtableRecord> {
    const r = await this.base(table).find(recordId);
    log.debug({ baseId: this.baseId, table, recordId }, 'Fetched record');
    return { id: r.id, fields: r.fields };
  }

  async updateRecord(table: string, recordId: string, fields: AirtableFields): Promise<void> {
    await this.base(table).update(recordId, fields);
    log.debug({ baseId: this.baseId, table, recordId, fields: Object.keys(fields) }, 'Updated record');
  }
}
