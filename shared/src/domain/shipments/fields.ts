/**
 * Shipment field catalogue
 *
 * The canonical fields a shipment record carries, the fixed header map used
 * to recognise them in worksheets, and the status vocabularies the sync
 * engine reacts to.
 */

export const SHIPMENT_FIELDS = [
    'shipmentNo',
    'orderName',
    'shipmentStatus',
    'sourceLocation',
    'destinationLocation',
    'serviceProvider',
    'insertTime',
    'planDate',
    'statusDelivery',
    'statusSite',
    'ata',
    'atd',
    'globalPodCycleStatistic',
    'period',
    'pmLocation',
    'lastStatus',
    'driverContactName',
    'driverContactNumber',
    'remark',
] as const;

export type ShipmentField = typeof SHIPMENT_FIELDS[number];

/** Identity key field — immutable once a record exists */
export const IDENTITY_FIELD = 'shipmentNo' satisfies ShipmentField;

/** Every field except the identity key */
export type ShipmentBusinessField = Exclude<ShipmentField, typeof IDENTITY_FIELD>;

export const BUSINESS_FIELDS: readonly ShipmentBusinessField[] = SHIPMENT_FIELDS.filter(
    (field): field is ShipmentBusinessField => field !== IDENTITY_FIELD
);

export function isBusinessField(value: string): value is ShipmentBusinessField {
    return BUSINESS_FIELDS.some(field => field === value);
}

/** Build a record with one entry per business field */
export function buildBusinessRecord<T>(value: (field: ShipmentBusinessField) => T): Record<ShipmentBusinessField, T> {
    return {
        orderName: value('orderName'),
        shipmentStatus: value('shipmentStatus'),
        sourceLocation: value('sourceLocation'),
        destinationLocation: value('destinationLocation'),
        serviceProvider: value('serviceProvider'),
        insertTime: value('insertTime'),
        planDate: value('planDate'),
        statusDelivery: value('statusDelivery'),
        statusSite: value('statusSite'),
        ata: value('ata'),
        atd: value('atd'),
        globalPodCycleStatistic: value('globalPodCycleStatistic'),
        period: value('period'),
        pmLocation: value('pmLocation'),
        lastStatus: value('lastStatus'),
        driverContactName: value('driverContactName'),
        driverContactNumber: value('driverContactNumber'),
        remark: value('remark'),
    };
}

/** Build a record with one entry per field, identity included */
export function buildFieldRecord<T>(value: (field: ShipmentField) => T): Record<ShipmentField, T> {
    return { shipmentNo: value(IDENTITY_FIELD), ...buildBusinessRecord(value) };
}

/**
 * Normalized header text → canonical field.
 * Keys must already be in normalizeHeader() form.
 */
export const HEADER_FIELD_MAP: Readonly<Record<string, ShipmentField>> = {
    'shipment no': 'shipmentNo',
    'shipment number': 'shipmentNo',
    'dn number': 'shipmentNo',
    'order name': 'orderName',
    'shipment status': 'shipmentStatus',
    'source location': 'sourceLocation',
    'destination location': 'destinationLocation',
    'service provider': 'serviceProvider',
    'insert time': 'insertTime',
    'plan mos date': 'planDate',
    'plan date': 'planDate',
    'status delivery': 'statusDelivery',
    'status site': 'statusSite',
    'ata': 'ata',
    'actual arrive time ata': 'ata',
    'atd': 'atd',
    'actual depart from start point atd': 'atd',
    'global pod cycle statistic': 'globalPodCycleStatistic',
    'period': 'period',
    'pm location': 'pmLocation',
    'last status': 'lastStatus',
    'driver contact name': 'driverContactName',
    'driver contact number': 'driverContactNumber',
    'remark': 'remark',
    'issue remark': 'remark',
};

// ============================================
// STATUS VOCABULARIES
// ============================================

/** statusDelivery values that stamp the ATA column (compared upper-cased) */
export const ARRIVAL_STATUSES: ReadonlySet<string> = new Set([
    'ARRIVED AT SITE',
    'POD',
]);

/** statusDelivery values that stamp the ATD column (compared upper-cased) */
export const DEPARTURE_STATUSES: ReadonlySet<string> = new Set([
    'TRANSPORTING FROM WH',
    'ON THE WAY',
]);

/** statusDelivery value that makes an old row eligible for archiving */
export const ARCHIVE_TERMINAL_STATUS = 'POD';

export function normalizeStatus(value: string | null | undefined): string {
    return (value ?? '').trim().toUpperCase();
}
