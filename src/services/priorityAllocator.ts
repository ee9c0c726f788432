import { IParkingSlotAllocator } from "../interfaces/allocator";
import { Category, isVehicleType } from "../dtos/vehicle.dto";
import { InMemorySlotRepo } from "../infra/inMemoryRepos";
import { InvalidVehicleTypeError } from "../errors";

const SPILLOVER: readonly Category[] = ['CAR', 'VIP'];

/**
 * Picks a slot for an incoming vehicle. First match wins:
 *  1. VIP customers take the first empty VIP slot.
 *  2. Otherwise the first empty slot of the requested type.
 *  3. CAR and EV overflow into CAR or VIP slots.
 * BIKE and HEAVY have no overflow. "First" is registry iteration order.
 */
export class PriorityAllocator implements IParkingSlotAllocator {
  constructor(private slotRepo: InMemorySlotRepo) {}

  allocate(requestedType: string, isVip: boolean): string | null {
    if (!isVehicleType(requestedType)) throw new InvalidVehicleTypeError(requestedType);

    if (isVip) {
      const [vip] = this.slotRepo.listEmptyByCategory(['VIP']);
      if (vip) return vip;
    }

    const [own] = this.slotRepo.listEmptyByCategory([requestedType]);
    if (own) return own;

    if (requestedType === 'CAR' || requestedType === 'EV') {
      const [overflow] = this.slotRepo.listEmptyByCategory(SPILLOVER);
      if (overflow) return overflow;
    }

    return null;
  }
}
