import { CATEGORIES, Category } from "../dtos/vehicle.dto";
import { LedgerEntry, Reservation, RevenueSummary } from "../dtos/session.dto";
import { CategoryOccupancy, OccupancySummary, ParkingSlot, SlotView } from "../interfaces/allocator";
import { Capacities } from "../config/lotConfig";
import { RandomSource, shuffle } from "./random";
import {
  AlreadyOccupiedError,
  InvalidConfigurationError,
  NotOccupiedError,
  SlotNotFoundError
} from "../errors";

const SLOT_PREFIX: Record<Category, string> = {
  BIKE: 'B',
  CAR: 'C',
  EV: 'E',
  HEAVY: 'H',
  VIP: 'V'
};

export function slotId(category: Category, sequence: number): string {
  return `${SLOT_PREFIX[category]}-${String(sequence).padStart(2, '0')}`;
}

function copyReservation(r: Reservation): Reservation {
  return { ...r, entryTime: new Date(r.entryTime.getTime()) };
}

/**
 * Slot registry. Slots are built once per session and only their occupancy
 * changes afterwards. Allocation scans follow `slots` order, which may be
 * shuffled at initialization; `index` maps an id to its position.
 */
export class InMemorySlotRepo {
  private slots: ParkingSlot[] = [];
  private index = new Map<string, number>();

  constructor(capacities?: Capacities, random: RandomSource | null = null) {
    if (capacities) this.initialize(capacities, random);
  }

  initialize(capacities: Capacities, random: RandomSource | null = null): void {
    const built: ParkingSlot[] = [];
    for (const category of CATEGORIES) {
      const capacity = capacities[category];
      if (!Number.isInteger(capacity) || capacity < 0) {
        throw new InvalidConfigurationError(`Capacity for ${category} must be a non-negative integer.`, { category, capacity });
      }
      for (let seq = 1; seq <= capacity; seq++) {
        built.push({ id: slotId(category, seq), category, reservation: null });
      }
    }

    this.slots = random ? shuffle(built, random) : built;
    this.index = new Map(this.slots.map((s, i) => [s.id, i]));
  }

  get size(): number {
    return this.slots.length;
  }

  findById(id: string): SlotView | undefined {
    const pos = this.index.get(id);
    return pos === undefined ? undefined : this.view(this.slots[pos]);
  }

  findByPlate(plate: string): string | null {
    const slot = this.slots.find(s => s.reservation !== null && s.reservation.plate === plate);
    return slot ? slot.id : null;
  }

  /** Empty slots of the given categories, in allocation order. */
  listEmptyByCategory(categories: readonly Category[]): string[] {
    return this.slots
      .filter(s => s.reservation === null && categories.includes(s.category))
      .map(s => s.id);
  }

  reserve(id: string, reservation: Reservation): void {
    const slot = this.get(id);
    if (slot.reservation !== null) throw new AlreadyOccupiedError(id);
    slot.reservation = copyReservation(reservation);
  }

  release(id: string): Reservation {
    const slot = this.get(id);
    const prior = slot.reservation;
    if (prior === null) throw new NotOccupiedError(id);
    slot.reservation = null;
    return prior;
  }

  /** All slots sorted by id. */
  snapshot(): SlotView[] {
    return this.slots
      .map(s => this.view(s))
      .sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
  }

  /** Ids in allocation order. */
  order(): string[] {
    return this.slots.map(s => s.id);
  }

  occupancy(): OccupancySummary {
    const byCategory: Record<Category, CategoryOccupancy> = {
      VIP: { total: 0, occupied: 0 },
      BIKE: { total: 0, occupied: 0 },
      CAR: { total: 0, occupied: 0 },
      EV: { total: 0, occupied: 0 },
      HEAVY: { total: 0, occupied: 0 }
    };

    let occupied = 0;
    for (const slot of this.slots) {
      byCategory[slot.category].total++;
      if (slot.reservation !== null) {
        byCategory[slot.category].occupied++;
        occupied++;
      }
    }

    const total = this.slots.length;
    return {
      total,
      occupied,
      available: total - occupied,
      utilization: total === 0 ? 0 : (occupied / total) * 100,
      byCategory
    };
  }

  private get(id: string): ParkingSlot {
    const pos = this.index.get(id);
    if (pos === undefined) throw new SlotNotFoundError(id);
    return this.slots[pos];
  }

  private view(slot: ParkingSlot): SlotView {
    return {
      id: slot.id,
      category: slot.category,
      reservation: slot.reservation ? Object.freeze(copyReservation(slot.reservation)) : null
    };
  }
}

/** Append-only record of completed visits. */
export class InMemoryLedgerRepo {
  private entries: Readonly<LedgerEntry>[] = [];

  append(entry: LedgerEntry): void {
    this.entries.push(Object.freeze({
      ...entry,
      entryTime: new Date(entry.entryTime.getTime()),
      exitTime: new Date(entry.exitTime.getTime())
    }));
  }

  list(): readonly Readonly<LedgerEntry>[] {
    return this.entries.slice();
  }

  aggregate(): RevenueSummary {
    const count = this.entries.length;
    if (count === 0) return { count: 0, totalFee: 0, averageDurationHours: 0 };

    let totalFee = 0;
    let totalHours = 0;
    for (const e of this.entries) {
      totalFee += e.fee;
      totalHours += e.billedHours;
    }
    return { count, totalFee, averageDurationHours: totalHours / count };
  }
}
