import { PoolClient } from 'pg';
import { BookingEvent, InventoryUnit, PriceSnapshot, UnitKind } from '../types/revenue.types';
import { InvalidUnitError, UnitNotFoundError } from '../utils/errors';
import { logger } from '../utils/logger';

/**
 * Storage seam for the engine: a read-only inventory snapshot, a window of
 * the booking log, and append-only writes.
 */
export interface InventoryRepository {
     fetchSnapshot(): Promise<InventoryUnit[]>;
     fetchUnit(unitId: number): Promise<InventoryUnit>;
     queryEventWindow(from: Date, to: Date, unitIds?: number[]): Promise<BookingEvent[]>;
     appendBookingEvent(event: BookingEvent): Promise<number>;
     appendPriceSnapshot(snapshot: PriceSnapshot): Promise<void>;
}

// PostgreSQL returns bigint and numeric columns as strings
type Numeric = number | string;

interface InventoryUnitRow {
     id: Numeric;
     kind: string;
     name: string;
     total_capacity: Numeric;
     remaining_capacity: Numeric;
     base_price: Numeric;
     elasticity: Numeric;
     departure_date: Date | null;
     procurement_date: Date | null;
     unit_cost: Numeric | null;
}

interface BookingEventRow {
     id: Numeric;
     unit_id: Numeric;
     partner_unit_id: Numeric | null;
     booked_at: Date;
     quantity: Numeric;
     sold_price: Numeric;
     base_price_at_sale: Numeric;
     is_bundle: boolean;
     discount_amount: Numeric;
}

const UNIT_COLUMNS = `
      id, kind, name, total_capacity, remaining_capacity, base_price,
      elasticity, departure_date, procurement_date, unit_cost
`;

function toInt(value: Numeric): number {
     return parseInt(String(value), 10);
}

function toNumber(value: Numeric): number {
     return parseFloat(String(value));
}

function toKind(unitId: number, kind: string): UnitKind {
     if (kind === 'HOTEL' || kind === 'FLIGHT') return kind;
     throw new InvalidUnitError(unitId, `unknown kind ${kind}`);
}

export function mapUnitRow(row: InventoryUnitRow): InventoryUnit {
     const id = toInt(row.id);
     return {
          id,
          kind: toKind(id, row.kind),
          name: row.name,
          totalCapacity: toInt(row.total_capacity),
          remainingCapacity: toInt(row.remaining_capacity),
          basePrice: toNumber(row.base_price),
          elasticity: toNumber(row.elasticity),
          departureDate: row.departure_date ?? undefined,
          procurementDate: row.procurement_date ?? undefined,
          unitCost: row.unit_cost === null ? undefined : toNumber(row.unit_cost),
     };
}

export function mapEventRow(row: BookingEventRow): BookingEvent {
     return {
          id: toInt(row.id),
          unitId: toInt(row.unit_id),
          partnerUnitId: row.partner_unit_id === null ? undefined : toInt(row.partner_unit_id),
          bookedAt: row.booked_at,
          quantity: toInt(row.quantity),
          soldPrice: toNumber(row.sold_price),
          basePriceAtSale: toNumber(row.base_price_at_sale),
          isBundle: row.is_bundle,
          discountAmount: toNumber(row.discount_amount),
     };
}

export class PgInventoryRepository implements InventoryRepository {
     constructor(private readonly client: PoolClient) {}

     async fetchSnapshot(): Promise<InventoryUnit[]> {
          const { rows } = await this.client.query<InventoryUnitRow>(
               `
      SELECT ${UNIT_COLUMNS}
      FROM inventory_unit
      ORDER BY id
    `
          );
          return rows.map(mapUnitRow);
     }

     async fetchUnit(unitId: number): Promise<InventoryUnit> {
          const { rows } = await this.client.query<InventoryUnitRow>(
               `
      SELECT ${UNIT_COLUMNS}
      FROM inventory_unit
      WHERE id = $1
    `,
               [unitId]
          );
          if (rows.length === 0) {
               throw new UnitNotFoundError(unitId);
          }
          return mapUnitRow(rows[0]);
     }

     async queryEventWindow(from: Date, to: Date, unitIds?: number[]): Promise<BookingEvent[]> {
          const params: unknown[] = [from, to];
          let unitFilter = '';
          if (unitIds !== undefined) {
               params.push(unitIds);
               unitFilter = 'AND unit_id = ANY($3::bigint[])';
          }

          const { rows } = await this.client.query<BookingEventRow>(
               `
      SELECT id, unit_id, partner_unit_id, booked_at, quantity, sold_price,
             base_price_at_sale, is_bundle, discount_amount
      FROM booking_event
      WHERE booked_at >= $1 AND booked_at <= $2
      ${unitFilter}
      ORDER BY booked_at, id
    `,
               params
          );
          return rows.map(mapEventRow);
     }

     async appendBookingEvent(event: BookingEvent): Promise<number> {
          const { rows } = await this.client.query<{ id: Numeric }>(
               `
      INSERT INTO booking_event (
        unit_id,
        partner_unit_id,
        booked_at,
        quantity,
        sold_price,
        base_price_at_sale,
        is_bundle,
        discount_amount
      ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
      RETURNING id
    `,
               [
                    event.unitId,
                    event.partnerUnitId ?? null,
                    event.bookedAt,
                    event.quantity,
                    event.soldPrice,
                    event.basePriceAtSale,
                    event.isBundle,
                    event.discountAmount,
               ]
          );

          const id = toInt(rows[0].id);
          logger.debug({ eventId: id, unitId: event.unitId }, 'Booking event appended');
          return id;
     }

     async appendPriceSnapshot(snapshot: PriceSnapshot): Promise<void> {
          await this.client.query(
               `
      INSERT INTO price_history (
        unit_id,
        recorded_at,
        remaining_capacity,
        final_price,
        lead_days,
        strategy,
        is_brake_active
      ) VALUES ($1, $2, $3, $4, $5, $6, $7)
    `,
               [
                    snapshot.unitId,
                    snapshot.recordedAt,
                    snapshot.remainingCapacity,
                    snapshot.finalPrice,
                    snapshot.leadDays,
                    snapshot.strategy,
                    snapshot.isBrakeActive,
               ]
          );
     }
}
