import { CheckInResult, Receipt, RevenueReport } from "../dtos/session.dto";
import { OccupancySummary, SlotView } from "../interfaces/allocator";
import { ErrorCodes, ParkingError } from "../errors";
import { Palette, plainPalette } from "./palette";

const RULE = '-'.repeat(55);
const BANNER = '='.repeat(55);

// Column widths
const STATUS_COLS = { slot: 8, status: 15, type: 8, vehicle: 20 };
const REPORT_COLS = { slot: 8, vehicle: 12, type: 8, duration: 10, fee: 10 };

function pad(text: string, width: number): string {
  return text.padEnd(width);
}

function money(amount: number): string {
  return `$${amount.toFixed(2)}`;
}

function two(n: number): string {
  return String(n).padStart(2, '0');
}

/** Local time as YYYY-MM-DD HH:MM:SS. */
export function formatTimestamp(at: Date): string {
  return `${at.getFullYear()}-${two(at.getMonth() + 1)}-${two(at.getDate())} ` +
    `${two(at.getHours())}:${two(at.getMinutes())}:${two(at.getSeconds())}`;
}

function banner(title: string, c: Palette): string[] {
  return [c.blue(BANNER), c.blue(title), c.blue(BANNER)];
}

export function renderStatus(slots: readonly SlotView[], occupancy: OccupancySummary, c: Palette = plainPalette): string {
  const lines = banner('SMART PARKING LOT STATUS DASHBOARD', c);
  lines.push(c.cyan(`Total Capacity: ${occupancy.total} | Occupied: ${occupancy.occupied} | Available: ${occupancy.available}`));
  lines.push(c.cyan(`Utilization: ${occupancy.utilization.toFixed(2)}%`));
  lines.push(RULE);

  const { slot, status, type, vehicle } = STATUS_COLS;
  lines.push(c.white([pad('SLOT', slot), pad('STATUS', status), pad('TYPE', type), 'VEHICLE NO'].join(' ')));
  lines.push(c.white('-'.repeat(slot + status + type + vehicle + 3)));

  for (const view of slots) {
    const r = view.reservation;
    if (r) {
      const statusText = r.isVip ? 'OCCUPIED (VIP)' : 'OCCUPIED';
      const statusColor = r.isVip ? c.magenta : c.red;
      const typeColor = r.isVip ? c.magenta : r.vehicleType === 'EV' ? c.green : r.vehicleType === 'BIKE' ? c.cyan : c.yellow;
      lines.push([pad(view.id, slot), statusColor(pad(statusText, status)), typeColor(pad(r.vehicleType, type)), r.plate].join(' '));
    } else {
      lines.push([pad(view.id, slot), c.green(pad('AVAILABLE', status)), view.category].join(' '));
    }
  }
  lines.push(RULE);
  return lines.join('\n');
}

export function renderReport(report: RevenueReport, c: Palette = plainPalette): string {
  const lines = banner('DAILY REVENUE REPORT', c);
  if (report.entries.length === 0) {
    lines.push(c.yellow('No transactions recorded yet for the day.'), RULE);
    return lines.join('\n');
  }

  const { summary } = report;
  lines.push(c.green(`Total Revenue Earned: ${money(summary.totalFee)}`));
  lines.push(c.green(`Total Vehicles Processed: ${summary.count}`));
  lines.push(c.green(`Average Parking Duration: ${summary.averageDurationHours.toFixed(1)} hours`));
  lines.push(RULE);

  const { slot, vehicle, type, duration, fee } = REPORT_COLS;
  lines.push(c.white([pad('SLOT', slot), pad('VEHICLE', vehicle), pad('TYPE', type), pad('DURATION', duration), 'FEE'].join(' ')));
  lines.push(c.white('-'.repeat(slot + vehicle + type + duration + fee + 4)));
  for (const e of report.entries) {
    lines.push([
      pad(e.slotId, slot),
      pad(e.plate, vehicle),
      pad(e.vehicleType, type),
      pad(e.billedHours.toFixed(1), duration),
      e.fee.toFixed(2)
    ].join(' '));
  }
  lines.push(RULE);
  return lines.join('\n');
}

export function renderCheckIn(result: CheckInResult, c: Palette = plainPalette): string {
  const color = result.isVip ? c.cyan : c.green;
  return [
    color(`[SUCCESS] Vehicle ${result.plate} (${result.vehicleType}) entered.`),
    color(`Allocated Slot: ${result.slotId} | Entry Time: ${formatTimestamp(result.entryTime)}`)
  ].join('\n');
}

export function renderReceipt(receipt: Receipt, c: Palette = plainPalette): string {
  return [
    c.green(`[EXIT REPORT] Vehicle ${receipt.plate} Exited from Slot ${receipt.slotId}`),
    c.green(RULE),
    c.yellow(`  Vehicle Type: ${receipt.vehicleType}`),
    c.yellow(`  Duration (Hrs): ${receipt.billedHours}`),
    c.yellow(`  Total Fee: ${money(receipt.fee)}`),
    c.green(RULE),
    c.magenta('  Thank you for parking with us!')
  ].join('\n');
}

export function describeError(err: ParkingError, c: Palette = plainPalette): string {
  if (err.internal) return c.red(`[INTERNAL] ${err.code}: ${err.message}`);
  switch (err.code) {
    case ErrorCodes.DUPLICATE_VEHICLE: return c.yellow(`[WARN] ${err.message}`);
    case ErrorCodes.LOT_FULL: return c.red(`[FAILURE] ${err.message}`);
    default: return c.red(`[ERROR] ${err.message}`);
  }
}
