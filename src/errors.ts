/**
 * Error types raised by the parking core.
 *
 * Every failure a caller can see is a ParkingError tagged with one of
 * ErrorCodes. None of them is fatal: the console front end prints them and
 * carries on.
 */

export const ErrorCodes = {
  INVALID_VEHICLE_TYPE: 'INVALID_VEHICLE_TYPE',
  INVALID_PLATE: 'INVALID_PLATE',
  DUPLICATE_VEHICLE: 'DUPLICATE_VEHICLE',
  LOT_FULL: 'LOT_FULL',
  VEHICLE_NOT_FOUND: 'VEHICLE_NOT_FOUND',
  INVALID_TIME_RANGE: 'INVALID_TIME_RANGE',
  ALREADY_OCCUPIED: 'ALREADY_OCCUPIED',
  NOT_OCCUPIED: 'NOT_OCCUPIED',
  SLOT_NOT_FOUND: 'SLOT_NOT_FOUND',
  INVALID_CONFIGURATION: 'INVALID_CONFIGURATION'
} as const;

export type ErrorCode = typeof ErrorCodes[keyof typeof ErrorCodes];

export class ParkingError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
    /** Registry invariant breaks; these point at a bug in the core, not at user input. */
    public readonly internal: boolean = false
  ) {
    super(message);
    this.name = 'ParkingError';
  }
}

export class InvalidVehicleTypeError extends ParkingError {
  constructor(type: string) {
    super(ErrorCodes.INVALID_VEHICLE_TYPE, `Invalid vehicle type "${type}". Must be BIKE, CAR, EV, or HEAVY.`, { type });
    this.name = 'InvalidVehicleTypeError';
  }
}

export class InvalidPlateError extends ParkingError {
  constructor() {
    super(ErrorCodes.INVALID_PLATE, 'Vehicle number must not be empty.');
    this.name = 'InvalidPlateError';
  }
}

export class DuplicateVehicleError extends ParkingError {
  constructor(plate: string, slotId: string) {
    super(ErrorCodes.DUPLICATE_VEHICLE, `Vehicle ${plate} is already parked in Slot ${slotId}.`, { plate, slotId });
    this.name = 'DuplicateVehicleError';
  }
}

export class LotFullError extends ParkingError {
  constructor(type: string) {
    super(ErrorCodes.LOT_FULL, `Parking lot is full for vehicle type ${type}.`, { type });
    this.name = 'LotFullError';
  }
}

export class VehicleNotFoundError extends ParkingError {
  constructor(plate: string) {
    super(ErrorCodes.VEHICLE_NOT_FOUND, `Vehicle ${plate} not found in the parking lot.`, { plate });
    this.name = 'VehicleNotFoundError';
  }
}

export class InvalidTimeRangeError extends ParkingError {
  constructor(entryTime: Date, exitTime: Date) {
    super(ErrorCodes.INVALID_TIME_RANGE, 'Exit time is before entry time.', {
      entryTime: entryTime.toISOString(),
      exitTime: exitTime.toISOString()
    });
    this.name = 'InvalidTimeRangeError';
  }
}

export class AlreadyOccupiedError extends ParkingError {
  constructor(slotId: string) {
    super(ErrorCodes.ALREADY_OCCUPIED, `Slot ${slotId} is already occupied.`, { slotId }, true);
    this.name = 'AlreadyOccupiedError';
  }
}

export class NotOccupiedError extends ParkingError {
  constructor(slotId: string) {
    super(ErrorCodes.NOT_OCCUPIED, `Slot ${slotId} is not occupied.`, { slotId }, true);
    this.name = 'NotOccupiedError';
  }
}

export class SlotNotFoundError extends ParkingError {
  constructor(slotId: string) {
    super(ErrorCodes.SLOT_NOT_FOUND, `Slot ${slotId} does not exist.`, { slotId }, true);
    this.name = 'SlotNotFoundError';
  }
}

export class InvalidConfigurationError extends ParkingError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCodes.INVALID_CONFIGURATION, message, details);
    this.name = 'InvalidConfigurationError';
  }
}
