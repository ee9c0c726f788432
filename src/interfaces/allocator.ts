import { Category } from "../dtos/vehicle.dto";
import { Reservation } from "../dtos/session.dto";

export interface ParkingSlot {
  id: string;
  category: Category;
  reservation: Reservation | null;
}

/** Read-side copy of a slot handed out by snapshots. */
export interface SlotView {
  id: string;
  category: Category;
  reservation: Readonly<Reservation> | null;
}

export interface CategoryOccupancy {
  total: number;
  occupied: number;
}

export interface OccupancySummary {
  total: number;
  occupied: number;
  available: number;
  utilization: number; // percent, 0 when the lot has no slots
  byCategory: Record<Category, CategoryOccupancy>;
}

export interface IParkingSlotAllocator {
  /** Returns the chosen slot id, or null when the lot is full for this request. */
  allocate(requestedType: string, isVip: boolean): string | null;
}
