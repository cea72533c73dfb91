import dotenv from 'dotenv';
import { loadEnvironmentConfig } from './config/config';
import { Simulator, type SimulationOptions } from './simulation/Simulator';

/**
 * Usage: node dist/simulate.js [days] [riders] [drivers]
 */
async function main(): Promise<void> {
  dotenv.config();
  const envConfig = loadEnvironmentConfig();
  const [days, riders, drivers] = process.argv.slice(2).map(arg => parseInt(arg, 10));

  const overrides: Partial<SimulationOptions> = {};
  if (Number.isFinite(days)) overrides.days = days;
  if (Number.isFinite(riders)) overrides.riders = riders;
  if (Number.isFinite(drivers)) overrides.drivers = drivers;

  const simulator = new Simulator(overrides, {
    config: envConfig.dispatch,
    pricing: envConfig.pricing
  });

  const { metrics } = await simulator.run();

  console.log('\n========== SIMULATION SUMMARY ==========');
  console.log(`Total rides:        ${metrics.totalRides}`);
  console.log(`Completed rides:    ${metrics.completedRides}`);
  console.log(`Unmatched rides:    ${metrics.unmatchedRides}`);
  console.log(`Avg wait (min):     ${metrics.averageWaitMinutes}`);
  console.log(`Avg duration (min): ${metrics.averageDurationMinutes}`);
  console.log(`Total fare:         ${metrics.totalFare.toFixed(2)}`);
  console.log(`Avg fare:           ${metrics.averageFare.toFixed(2)}`);
  console.log('\nPer driver:');
  for (const driver of metrics.drivers) {
    console.log(
      `  ${driver.name.padEnd(10)} rides=${driver.completedRides} ` +
      `fare=${driver.totalFare.toFixed(2)} avg=${driver.averageFare.toFixed(2)} ` +
      `cancelled=${driver.cancelledRides}`
    );
  }
}

main().catch(error => {
  console.error('Simulation failed:', error);
  process.exit(1);
});
