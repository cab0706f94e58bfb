/**
 * Shared driver for the benchmark runner scripts
 */

import { Bench } from 'tinybench';
import {
  describeProfile,
  getBenchmarkConfig,
  getBenchmarkProfile,
  getBenchmarkRecommendations,
} from './config';
import { formatBenchResults, formatIndividualResults, resultsToMarkdownTable } from './formatting';
import type { FormattedResult } from './formatting';

/**
 * Build a bench with the active profile, let `register` add tasks, run them
 * and print progress and results to the console
 */
export async function runSuite(
  title: string,
  register: (bench: Bench) => void,
): Promise<FormattedResult[]> {
  console.log(`🚀 Running ${title}\n`);

  console.log('💡 Benchmark Reliability Tips:');
  for (const tip of getBenchmarkRecommendations()) {
    console.log(`   ${tip}`);
  }

  const profile = getBenchmarkProfile();
  console.log(`\n📊 Using profile ${describeProfile(profile)}\n`);

  const bench = new Bench(getBenchmarkConfig());
  register(bench);

  const total = bench.tasks.length;
  let completed = 0;
  bench.addEventListener('cycle', (event) => {
    completed++;
    console.log(`[${completed.toString()}/${total.toString()}] Completed: ${event.task?.name ?? 'unknown task'}`);
  });

  console.log(`Running ${total.toString()} benchmarks...\n`);
  await bench.run();

  const results = formatBenchResults(bench.tasks);
  console.log('\n📊 Benchmark Results\n');
  console.log('='.repeat(80));
  console.log(resultsToMarkdownTable(results));
  console.log('');
  console.log(formatIndividualResults(results));
  return results;
}
