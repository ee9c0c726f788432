#!/usr/bin/env node
import { loadLotConfig } from "./config/lotConfig";
import { ParkingService } from "./services/parkingService";
import { consoleLogger, silentLogger } from "./infra/logger";
import { runMenu } from "./cli/menu";
import { createPalette, shouldUseColor } from "./cli/palette";

async function main() {
  const config = loadLotConfig();
  const service = ParkingService.create(config.capacities, config.random, {
    logger: config.debug ? consoleLogger : silentLogger
  });

  const color = shouldUseColor(process.stdout.isTTY);
  await runMenu(service, {
    input: process.stdin,
    write: text => { process.stdout.write(text); },
    palette: createPalette(color),
    clearScreen: color
  });
}

main().catch(err => {
  console.error(err);
  process.exitCode = 1;
});
