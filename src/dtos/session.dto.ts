import { Category, VehicleType } from "./vehicle.dto";

/** Occupancy record. Lives on its slot from check-in until check-out. */
export interface Reservation {
  id: string;
  plate: string;
  vehicleType: VehicleType;
  entryTime: Date;
  isVip: boolean;
}

export interface CheckInResult {
  plate: string;
  vehicleType: VehicleType;
  isVip: boolean;
  slotId: string;
  slotCategory: Category;
  entryTime: Date;
}

export interface Receipt {
  plate: string;
  slotId: string;
  slotCategory: Category;
  vehicleType: VehicleType;
  entryTime: Date;
  exitTime: Date;
  billedHours: number;
  fee: number;
}

export interface LedgerEntry extends Receipt {
  id: string;
}

export interface RevenueSummary {
  count: number;
  totalFee: number;
  averageDurationHours: number;
}

export interface RevenueReport {
  summary: RevenueSummary;
  entries: readonly LedgerEntry[];
}
