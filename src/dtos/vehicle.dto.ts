export type VehicleType = 'BIKE' | 'CAR' | 'EV' | 'HEAVY';

/** Slot classes. VIP is a slot pool, never a vehicle type a driver can request. */
export type Category = VehicleType | 'VIP';

export const VEHICLE_TYPES: readonly VehicleType[] = ['BIKE', 'CAR', 'EV', 'HEAVY'];

// VIP first: the reserved pool is laid out before the standard slots
export const CATEGORIES: readonly Category[] = ['VIP', 'BIKE', 'CAR', 'EV', 'HEAVY'];

export function isVehicleType(value: string): value is VehicleType {
  return VEHICLE_TYPES.some(t => t === value);
}

export function isCategory(value: string): value is Category {
  return CATEGORIES.some(c => c === value);
}

