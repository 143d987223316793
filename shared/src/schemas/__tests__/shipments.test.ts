import { archiveSweepInputSchema, assignPmLocationInputSchema, writeBackInputSchema } from '../shipments.js';

describe('writeBackInputSchema', () => {
  it('trims values and turns empty strings into null', () => {
    const parsed = writeBackInputSchema.parse({
      shipmentNo: ' SH-1 ',
      fields: { statusDelivery: ' POD ', remark: '' },
    });
    expect(parsed).toEqual({
      shipmentNo: 'SH-1',
      fields: { statusDelivery: 'POD', remark: null },
      options: { skipRemote: false },
    });
  });

  it('requires at least one field', () => {
    expect(writeBackInputSchema.safeParse({ shipmentNo: 'SH-1', fields: {} }).success).toBe(false);
  });

  it('rejects the identity field and unknown fields', () => {
    expect(writeBackInputSchema.safeParse({ shipmentNo: 'SH-1', fields: { shipmentNo: 'x' } }).success).toBe(false);
    expect(writeBackInputSchema.safeParse({ shipmentNo: 'SH-1', fields: { colour: 'red' } }).success).toBe(false);
  });

  it('rejects a blank shipment number', () => {
    expect(writeBackInputSchema.safeParse({ shipmentNo: '  ', fields: { remark: 'x' } }).success).toBe(false);
  });
});

describe('assignPmLocationInputSchema', () => {
  it('requires both order name and location', () => {
    expect(assignPmLocationInputSchema.safeParse({ orderName: 'ORD-1', pmLocation: ' ' }).success).toBe(false);
    expect(assignPmLocationInputSchema.parse({ orderName: ' ORD-1 ', pmLocation: 'Site A' })).toEqual({
      orderName: 'ORD-1',
      pmLocation: 'Site A',
      options: { skipRemote: false },
    });
  });
});

describe('archiveSweepInputSchema', () => {
  it('defaults to seven days', () => {
    expect(archiveSweepInputSchema.parse({})).toEqual({ thresholdDays: 7 });
  });

  it('rejects negative and fractional thresholds', () => {
    expect(archiveSweepInputSchema.safeParse({ thresholdDays: -1 }).success).toBe(false);
    expect(archiveSweepInputSchema.safeParse({ thresholdDays: 1.5 }).success).toBe(false);
  });
});
