/**
 * Benchmark configuration profiles, selected with BENCHMARK_PROFILE
 */

import type { BenchOptions } from 'tinybench';

export type BenchmarkProfile = 'quick' | 'standard' | 'precise';

/**
 * Configuration profiles for different benchmark scenarios
 */
export const BENCHMARK_PROFILES: Readonly<Record<BenchmarkProfile, BenchOptions>> = {
  /**
   * Development runs; fast but noisy
   */
  quick: {
    time: 250,
    iterations: 10,
    warmup: true,
  },

  standard: {
    time: 1000,
    warmup: true,
  },

  /**
   * CI runs. Collects garbage before warmup and after each task when node
   * is started with --expose-gc.
   */
  precise: {
    time: 2000,
    iterations: 200,
    warmup: true,
    setup: (_task, mode) => {
      if (mode === 'warmup') {
        globalThis.gc?.();
        globalThis.gc?.();
      }
    },
    teardown: () => {
      globalThis.gc?.();
    },
  },
};

function isProfile(value: string): value is BenchmarkProfile {
  return value === 'quick' || value === 'standard' || value === 'precise';
}

/**
 * Resolve the active profile; unknown names fall back to `standard`
 */
export function getBenchmarkProfile(env: NodeJS.ProcessEnv = process.env): BenchmarkProfile {
  const profile = env.BENCHMARK_PROFILE ?? 'standard';
  return isProfile(profile) ? profile : 'standard';
}

export function getBenchmarkConfig(env: NodeJS.ProcessEnv = process.env): BenchOptions {
  return BENCHMARK_PROFILES[getBenchmarkProfile(env)];
}

/**
 * One-line summary of a profile for runner output
 */
export function describeProfile(profile: BenchmarkProfile): string {
  const { time, iterations } = BENCHMARK_PROFILES[profile];
  const runtime = time === undefined ? 'default runtime' : `${time.toString()}ms per benchmark`;
  const minimum = iterations === undefined ? 'default' : iterations.toString();
  return `${profile}: ${runtime}, min ${minimum} iterations`;
}

/**
 * Recommendations for benchmark reliability
 */
export function getBenchmarkRecommendations(env: NodeJS.ProcessEnv = process.env): string[] {
  const recommendations = [
    '🔧 For best results, run benchmarks on a dedicated machine',
    '🔇 Close unnecessary applications to reduce system noise',
    '⚡ Start node with --expose-gc so the precise profile can collect garbage between tasks',
    '📊 Run multiple benchmark sessions and compare results',
  ];

  if (env.NODE_ENV === 'development') {
    recommendations.push('🚀 Use BENCHMARK_PROFILE=quick for faster development cycles');
  }

  if (env.CI) {
    recommendations.push('🏗️  CI environments may have higher variance - consider dedicated runners');
  }

  return recommendations;
}
