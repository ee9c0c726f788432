import { createInterface } from 'node:readline';
import { Readable } from 'node:stream';
import { ParkingService } from "../services/parkingService";
import { ParkingError } from "../errors";
import { Palette, plainPalette } from "./palette";
import { describeError, renderCheckIn, renderReceipt, renderReport, renderStatus } from "./render";

const CLEAR_SCREEN = '\x1b[2J\x1b[H';

export interface MenuIO {
  input: Readable;
  write: (text: string) => void;
  palette?: Palette;
  clearScreen?: boolean;
}

/**
 * Interactive loop: 1 entry, 2 exit, 3 status, 4 report, 5 quit. An empty
 * choice or a closed input stream also ends it.
 */
export async function runMenu(service: ParkingService, io: MenuIO): Promise<void> {
  const c = io.palette ?? plainPalette;
  const rl = createInterface({ input: io.input, terminal: false });
  const lines = rl[Symbol.asyncIterator]();

  const print = (text: string) => io.write(`${text}\n`);
  const clear = () => { if (io.clearScreen) io.write(CLEAR_SCREEN); };
  const ask = async (prompt: string): Promise<string | null> => {
    io.write(prompt);
    const next = await lines.next();
    return next.done ? null : next.value.trim();
  };
  const pause = async () => (await ask(c.yellow('\nPress Enter to return to menu...'))) !== null;

  // Only ParkingError is an expected outcome; anything else propagates
  const attempt = (action: () => string) => {
    try {
      print(`\n${action()}`);
    } catch (err) {
      if (!(err instanceof ParkingError)) throw err;
      print(`\n${describeError(err, c)}`);
    }
  };

  try {
    for (;;) {
      clear();
      print(renderStatus(service.currentSnapshot(), service.occupancy(), c));
      print(c.yellow('\n\n--- MENU ---'));
      print(c.green('1. Vehicle Entry'));
      print(c.green('2. Vehicle Exit'));
      print(c.green('3. View Parking Status (Current)'));
      print(c.green('4. View Daily Revenue Report'));
      print(c.red('5. Exit System'));
      print(c.yellow('--------------------------------------'));

      const raw = await ask(c.cyan('Enter your choice (1-5): '));
      if (raw === null) {
        print(c.red('\n[SYSTEM] Input stream closed. Exiting.'));
        return;
      }
      if (raw === '') return;
      if (!/^\d+$/.test(raw)) {
        print(c.red('\nInvalid input. Please enter a number between 1 and 5.'));
        continue;
      }

      switch (Number(raw)) {
        case 1: {
          clear();
          print(c.magenta('--- VEHICLE ENTRY ---'));
          const plate = await ask('Enter Vehicle Number: ');
          const type = plate === null ? null : await ask('Enter Vehicle Type (BIKE/CAR/EV/HEAVY): ');
          const vip = type === null ? null : await ask('Is this a VIP/Loyalty Customer? (y/n): ');
          if (plate === null || type === null || vip === null) return;
          attempt(() => renderCheckIn(service.checkIn(plate, type, vip.toLowerCase() === 'y'), c));
          if (!(await pause())) return;
          break;
        }
        case 2: {
          clear();
          print(c.magenta('--- VEHICLE EXIT ---'));
          const plate = await ask('Enter Vehicle Number to Exit: ');
          if (plate === null) return;
          attempt(() => renderReceipt(service.checkOut(plate), c));
          if (!(await pause())) return;
          break;
        }
        case 3:
          clear();
          print(renderStatus(service.currentSnapshot(), service.occupancy(), c));
          if (!(await pause())) return;
          break;
        case 4:
          clear();
          print(renderReport(service.revenueReport(), c));
          if (!(await pause())) return;
          break;
        case 5:
          clear();
          print(c.green('Thank you for using the Smart Parking Management System. Goodbye!'));
          return;
        default:
          print(c.red('\nInvalid choice. Please select a valid option (1-5).'));
      }
    }
  } finally {
    rl.close();
  }
}
