import { describe, expect, it, vi } from 'vitest';
import type { AirtableFields } from '../src/airtable-client';
import { mapFieldsToVendor } from '../src/map-from-airtable';
import { AirtableVendorSink } from '../src/remote-sink';

describe('AirtableVendorSink', () => {
  it('writes the seat count to the linked record', async () => {
    const updateRecord = vi.fn(async (_table: string, _id: string, _fields: AirtableFields) => {});
    const sink = new AirtableVendorSink({ updateRecord }, 'Software Vendors');

    await sink.pushVendor({ ...mapFieldsToVendor({ name: 'Okta', users: 40 }), id: 1, airtable_record_id: 'recOK' });

    expect(updateRecord).toHaveBeenCalledWith('Software Vendors', 'recOK', { users: 40 });
  });

  it('skips rows without a link', async () => {
    const updateRecord = vi.fn(async (_table: string, _id: string, _fields: AirtableFields) => {});
    const sink = new AirtableVendorSink({ updateRecord }, 'Software Vendors');

    await sink.pushVendor({ ...mapFieldsToVendor({ name: 'Okta' }), id: 1, airtable_record_id: '' });

    expect(updateRecord).not.toHaveBeenCalled();
  });
});
