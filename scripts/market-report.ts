import { readFile } from "node:fs/promises";
import path from "node:path";
import { analyzeMarketTrends } from "../src/analysis/compatibility.engine";
import { parseMarketTrendsRequest } from "../src/api/request.schemas";
import { loadEnv } from "../src/config/env";
import { createLogger } from "../src/config/logger";

async function run(): Promise<void> {
  const inputPath = process.argv[2];
  if (!inputPath) {
    throw new Error("Usage: market-report <jobs.json>");
  }

  const env = loadEnv();
  const logger = createLogger({ minLevel: env.logLevel });
  const raw: unknown = JSON.parse(await readFile(path.resolve(inputPath), "utf8"));
  const parsed = parseMarketTrendsRequest({ jobs: raw }, env.marketTrendsMaxJobs);
  if (!parsed.ok) {
    throw new Error(`Invalid job file: ${parsed.error_code}`);
  }

  const trends = analyzeMarketTrends(parsed.data.jobs, { skillMatchMode: env.skillMatchMode });
  logger.info("Market report built", { totalAnalyzed: trends.totalAnalyzed });

  console.log(`Jobs analyzed: ${trends.totalAnalyzed}`);
  console.log("Most demanded skills:");
  for (const entry of trends.topSkills) {
    console.log(`  ${entry.name}: ${entry.count}`);
  }
  console.log("Top hiring companies:");
  for (const entry of trends.topCompanies) {
    console.log(`  ${entry.name}: ${entry.count}`);
  }
  for (const band of trends.salaryBands) {
    console.log(`Salary (${band.period}, ${band.count} postings): ${band.averageMin} - ${band.averageMax}`);
  }
}

run().catch((error) => {
  console.error("market-report failed:", error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
