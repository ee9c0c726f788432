import { ParkingService } from "../src/services/parkingService";
import { Capacities } from "../src/config/lotConfig";
import { fixedClock } from "../src/infra/time";
import { Logger } from "../src/infra/logger";
import {
  DuplicateVehicleError,
  InvalidPlateError,
  InvalidTimeRangeError,
  InvalidVehicleTypeError,
  LotFullError,
  VehicleNotFoundError
} from "../src/errors";

const lot = (overrides: Partial<Capacities>): Capacities => ({ BIKE: 0, CAR: 0, EV: 0, HEAVY: 0, VIP: 0, ...overrides });
const start = new Date(2026, 0, 5, 9, 0, 0);

function setup(capacities: Capacities, logger?: Logger) {
  const time = fixedClock(start);
  const service = ParkingService.create(capacities, null, { clock: time.clock, logger });
  return { service, time };
}

describe('checkIn', () => {
  test('fills CAR, spills the next CAR into VIP, then reports the lot full', () => {
    const { service } = setup(lot({ CAR: 1, VIP: 1 }));
    expect(service.checkIn('AB1', 'CAR').slotId).toBe('C-01');

    const spilled = service.checkIn('AB2', 'CAR');
    expect(spilled.slotId).toBe('V-01');
    expect(spilled.slotCategory).toBe('VIP');
    expect(spilled.isVip).toBe(false);

    expect(() => service.checkIn('AB3', 'CAR')).toThrow(LotFullError);
  });

  test('returns the entry time from the clock', () => {
    const { service } = setup(lot({ CAR: 1 }));
    expect(service.checkIn('AB1', 'CAR').entryTime).toEqual(start);
  });

  test('rejects a vehicle that is already parked, whatever the case or type', () => {
    const { service } = setup(lot({ CAR: 1, BIKE: 1 }));
    service.checkIn('XY1', 'CAR');
    expect(() => service.checkIn('xy1', 'BIKE')).toThrow(DuplicateVehicleError);
    expect(service.occupancy().occupied).toBe(1);
  });

  test('normalizes plate and type', () => {
    const { service } = setup(lot({ CAR: 1 }));
    const result = service.checkIn('  ab1 ', 'car');
    expect(result.plate).toBe('AB1');
    expect(result.vehicleType).toBe('CAR');
    expect(service.checkOut('Ab1').plate).toBe('AB1');
  });

  test('rejects VIP, unknown types and empty plates', () => {
    const { service } = setup(lot({ CAR: 1, VIP: 1 }));
    expect(() => service.checkIn('AB1', 'VIP', true)).toThrow(InvalidVehicleTypeError);
    expect(() => service.checkIn('AB1', 'TRUCK')).toThrow(InvalidVehicleTypeError);
    expect(() => service.checkIn('   ', 'CAR')).toThrow(InvalidPlateError);
    expect(service.occupancy().occupied).toBe(0);
  });

  test('VIP customers land in the VIP pool first', () => {
    const { service } = setup(lot({ EV: 2, VIP: 1 }));
    expect(service.checkIn('EV1', 'EV', true).slotId).toBe('V-01');
  });

  test('every parked vehicle sits in exactly one slot', () => {
    const { service } = setup(lot({ BIKE: 2, CAR: 2, EV: 1, VIP: 2 }));
    const plates = ['P1', 'P2', 'P3', 'P4', 'P5', 'P6'];
    const types = ['BIKE', 'CAR', 'EV', 'EV', 'CAR', 'BIKE'];
    const assigned = plates.map((p, i) => service.checkIn(p, types[i]));

    const snapshot = service.currentSnapshot();
    plates.forEach((plate, i) => {
      const holding = snapshot.filter(s => s.reservation?.plate === plate);
      expect(holding).toHaveLength(1);
      expect(holding[0].id).toBe(assigned[i].slotId);
      expect(holding[0].category).toBe(assigned[i].slotCategory);
    });
  });

  test('logs a warning when no slot is free', () => {
    const logger = { info: jest.fn(), warn: jest.fn() };
    const { service } = setup(lot({ HEAVY: 0 }), logger);
    expect(() => service.checkIn('H1', 'HEAVY')).toThrow(LotFullError);
    expect(logger.warn).toHaveBeenCalledWith('no slot available', { plate: 'H1', vehicleType: 'HEAVY', isVip: false });
  });
});

describe('checkOut', () => {
  test('an immediate exit bills one hour at the flat rate', () => {
    const { service } = setup(lot({ BIKE: 1, CAR: 1, EV: 1, HEAVY: 1 }));
    const expected: Array<[string, number]> = [['BIKE', 5], ['CAR', 10], ['EV', 12], ['HEAVY', 15]];
    for (const [type, fee] of expected) {
      service.checkIn(`${type}-1`, type);
      const receipt = service.checkOut(`${type}-1`);
      expect(receipt.billedHours).toBe(1);
      expect(receipt.fee).toBe(fee);
    }
  });

  test('a CAR that spilled into a VIP slot pays CAR rates', () => {
    const { service, time } = setup(lot({ CAR: 1, VIP: 1 }));
    service.checkIn('AB1', 'CAR');
    service.checkIn('AB2', 'CAR');
    time.advanceSeconds(4 * 3600);

    const receipt = service.checkOut('AB2');
    expect(receipt).toEqual({
      plate: 'AB2',
      slotId: 'V-01',
      slotCategory: 'VIP',
      vehicleType: 'CAR',
      entryTime: start,
      exitTime: new Date(start.getTime() + 4 * 3600 * 1000),
      billedHours: 4,
      fee: 20
    });
    expect(service.currentSnapshot().find(s => s.id === 'V-01')?.reservation).toBeNull();
  });

  test('VIP customers are billed at their vehicle type', () => {
    const { service, time } = setup(lot({ EV: 1, VIP: 1 }));
    service.checkIn('EV1', 'EV', true);
    time.advanceSeconds(3 * 3600);
    expect(service.checkOut('EV1')).toMatchObject({ slotCategory: 'VIP', vehicleType: 'EV', billedHours: 3, fee: 18 });
  });

  test('an unknown vehicle changes nothing', () => {
    const { service } = setup(lot({ CAR: 1 }));
    service.checkIn('AB1', 'CAR');
    const before = service.currentSnapshot();
    expect(() => service.checkOut('ZZ9')).toThrow(VehicleNotFoundError);
    expect(service.currentSnapshot()).toEqual(before);
    expect(service.revenueReport().summary.count).toBe(0);
  });

  test('an empty vehicle number is simply not found', () => {
    const { service } = setup(lot({ CAR: 1 }));
    expect(() => service.checkOut('   ')).toThrow(VehicleNotFoundError);
    expect(() => service.checkOut('')).toThrow(VehicleNotFoundError);
    expect(service.revenueReport().summary.count).toBe(0);
  });

  test('a clock that ran backwards leaves the vehicle parked and the ledger empty', () => {
    const { service, time } = setup(lot({ CAR: 1 }));
    service.checkIn('AB1', 'CAR');
    time.advanceSeconds(-60);
    expect(() => service.checkOut('AB1')).toThrow(InvalidTimeRangeError);
    expect(service.currentSnapshot()[0].reservation?.plate).toBe('AB1');
    expect(service.revenueReport().entries).toHaveLength(0);
  });

  test('the freed slot can be taken again', () => {
    const { service } = setup(lot({ CAR: 1 }));
    service.checkIn('AB1', 'CAR');
    service.checkOut('AB1');
    expect(service.checkIn('AB2', 'CAR').slotId).toBe('C-01');
  });
});

describe('revenueReport', () => {
  test('is zeroed before any exit', () => {
    const { service } = setup(lot({ CAR: 1 }));
    expect(service.revenueReport()).toEqual({
      summary: { count: 0, totalFee: 0, averageDurationHours: 0 },
      entries: []
    });
  });

  test('aggregates completed visits in exit order', () => {
    const { service, time } = setup(lot({ CAR: 2 }));
    service.checkIn('AB1', 'CAR');
    service.checkIn('AB2', 'CAR');
    service.checkOut('AB2');
    time.advanceSeconds(5 * 3600);
    service.checkOut('AB1');

    const report = service.revenueReport();
    expect(report.summary).toEqual({ count: 2, totalFee: 35, averageDurationHours: 3 });
    expect(report.entries.map(e => e.plate)).toEqual(['AB2', 'AB1']);
    expect(report.entries[0].id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
  });

  test('initialize starts a new session', () => {
    const { service } = setup(lot({ CAR: 1 }));
    service.checkIn('AB1', 'CAR');
    service.checkOut('AB1');
    service.checkIn('AB2', 'CAR');

    service.initialize(lot({ BIKE: 1 }));
    expect(service.revenueReport().summary.count).toBe(0);
    expect(service.currentSnapshot().map(s => s.id)).toEqual(['B-01']);
    expect(() => service.checkOut('AB2')).toThrow(VehicleNotFoundError);
  });
});
