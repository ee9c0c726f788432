import { v4 as uuid } from 'uuid';
import { InMemorySlotRepo, InMemoryLedgerRepo } from "../infra/inMemoryRepos";
import { PriorityAllocator } from "./priorityAllocator";
import { FeeCalculatorFactory } from "./feeCalculatorFactory";
import { isVehicleType } from "../dtos/vehicle.dto";
import { CheckInResult, Receipt, Reservation, RevenueReport } from "../dtos/session.dto";
import { OccupancySummary, SlotView } from "../interfaces/allocator";
import { Capacities } from "../config/lotConfig";
import { RandomSource } from "../infra/random";
import { Clock, systemClock } from "../infra/time";
import { Logger, silentLogger } from "../infra/logger";
import {
  DuplicateVehicleError,
  InvalidPlateError,
  InvalidVehicleTypeError,
  LotFullError,
  SlotNotFoundError,
  VehicleNotFoundError
} from "../errors";

export interface ParkingServiceOptions {
  clock?: Clock;
  feeCalculators?: FeeCalculatorFactory;
  logger?: Logger;
}

/** Plates are compared case-insensitively; surrounding whitespace is dropped. */
export function normalizePlate(plate: string): string {
  return plate.trim().toUpperCase();
}

/**
 * One parking session: owns the slot registry and the ledger. Every
 * operation either commits all of its changes or none of them.
 */
export class ParkingService {
  private allocator: PriorityAllocator;
  private clock: Clock;
  private feeCalculators: FeeCalculatorFactory;
  private logger: Logger;

  constructor(
    private slotRepo: InMemorySlotRepo,
    private ledgerRepo: InMemoryLedgerRepo,
    options: ParkingServiceOptions = {}
  ) {
    this.allocator = new PriorityAllocator(slotRepo);
    this.clock = options.clock ?? systemClock;
    this.feeCalculators = options.feeCalculators ?? new FeeCalculatorFactory();
    this.logger = options.logger ?? silentLogger;
  }

  static create(capacities: Capacities, random: RandomSource | null = null, options: ParkingServiceOptions = {}): ParkingService {
    return new ParkingService(new InMemorySlotRepo(capacities, random), new InMemoryLedgerRepo(), options);
  }

  /** Starts a fresh session over the same service: new slots, empty ledger. */
  initialize(capacities: Capacities, random: RandomSource | null = null): void {
    this.slotRepo.initialize(capacities, random);
    this.ledgerRepo = new InMemoryLedgerRepo();
    this.logger.info('lot initialized', { slots: this.slotRepo.size });
  }

  checkIn(plate: string, type: string, isVip = false): CheckInResult {
    const vehicleType = type.trim().toUpperCase();
    if (!isVehicleType(vehicleType)) throw new InvalidVehicleTypeError(type);
    const normalized = normalizePlate(plate);
    if (normalized === '') throw new InvalidPlateError();

    const existing = this.slotRepo.findByPlate(normalized);
    if (existing !== null) throw new DuplicateVehicleError(normalized, existing);

    const slotId = this.allocator.allocate(vehicleType, isVip);
    if (slotId === null) {
      this.logger.warn('no slot available', { plate: normalized, vehicleType, isVip });
      throw new LotFullError(vehicleType);
    }

    const reservation: Reservation = {
      id: uuid(),
      plate: normalized,
      vehicleType,
      entryTime: this.clock(),
      isVip
    };
    this.slotRepo.reserve(slotId, reservation);

    const slotCategory = this.requireSlot(slotId).category;
    this.logger.info('vehicle checked in', { plate: normalized, slotId, slotCategory });
    return { plate: normalized, vehicleType, isVip, slotId, slotCategory, entryTime: reservation.entryTime };
  }

  checkOut(plate: string): Receipt {
    const normalized = normalizePlate(plate);
    const slotId = this.slotRepo.findByPlate(normalized);
    if (slotId === null) throw new VehicleNotFoundError(normalized);

    const slot = this.requireSlot(slotId);
    const reservation = slot.reservation;
    if (reservation === null) throw new VehicleNotFoundError(normalized);

    // Billed at the requested type even when the vehicle overflowed into a VIP slot
    const exitTime = this.clock();
    const { fee, billedHours } = this.feeCalculators
      .for(reservation.vehicleType)
      .calculate(reservation.entryTime, exitTime);

    const receipt: Receipt = {
      plate: normalized,
      slotId,
      slotCategory: slot.category,
      vehicleType: reservation.vehicleType,
      entryTime: new Date(reservation.entryTime.getTime()),
      exitTime,
      billedHours,
      fee
    };

    this.ledgerRepo.append({ id: uuid(), ...receipt });
    this.slotRepo.release(slotId);
    this.logger.info('vehicle checked out', { plate: normalized, slotId, fee });
    return receipt;
  }

  currentSnapshot(): SlotView[] {
    return this.slotRepo.snapshot();
  }

  occupancy(): OccupancySummary {
    return this.slotRepo.occupancy();
  }

  revenueReport(): RevenueReport {
    return {
      summary: this.ledgerRepo.aggregate(),
      entries: this.ledgerRepo.list()
    };
  }

  private requireSlot(slotId: string): SlotView {
    const slot = this.slotRepo.findById(slotId);
    if (!slot) throw new SlotNotFoundError(slotId);
    return slot;
  }
}
