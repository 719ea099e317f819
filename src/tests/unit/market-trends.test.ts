import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { analyzeMarketTrends } from "../../analysis/market-trends";

describe("analyzeMarketTrends", () => {
  it("counts skills across postings", () => {
    const trends = analyzeMarketTrends([
      { description: "Python developer" },
      { description: "Senior Python engineer" },
      { description: "Data analyst using Python and SQL" },
    ]);

    assert.deepEqual(trends, {
      topSkills: [
        { name: "python", count: 3 },
        { name: "sql", count: 1 },
      ],
      topCompanies: [],
      totalAnalyzed: 3,
      salaryBands: [],
    });
  });

  it("breaks count ties by first appearance", () => {
    const trends = analyzeMarketTrends([
      { description: "Rust" },
      { description: "PHP" },
      { description: "PHP and Rust" },
    ]);
    assert.deepEqual(trends.topSkills, [
      { name: "rust", count: 2 },
      { name: "php", count: 2 },
    ]);
  });

  it("counts companies and skips blank names", () => {
    const trends = analyzeMarketTrends([
      { description: "", company: "Acme" },
      { description: "", company: "Globex" },
      { description: "", company: " Acme " },
      { description: "", company: "  " },
      { description: "" },
    ]);
    assert.deepEqual(trends.topCompanies, [
      { name: "Acme", count: 2 },
      { name: "Globex", count: 1 },
    ]);
    assert.equal(trends.totalAnalyzed, 5);
  });

  it("limits the company list to ten entries", () => {
    const jobs = Array.from({ length: 12 }, (_, index) => ({
      description: "",
      company: `Company ${index + 1}`,
    }));
    const trends = analyzeMarketTrends(jobs);
    assert.equal(trends.topCompanies.length, 10);
    assert.deepEqual(trends.topCompanies[9], { name: "Company 10", count: 1 });
  });

  it("averages salary ranges per period", () => {
    const trends = analyzeMarketTrends([
      { description: "", salaryRange: "5000-7000/month" },
      { description: "", salaryRange: "85000-105000" },
      { description: "", salaryRange: "4000-6000 monthly" },
      { description: "", salaryRange: "not disclosed" },
    ]);
    assert.deepEqual(trends.salaryBands, [
      { period: "month", count: 2, averageMin: 4500, averageMax: 6500 },
      { period: "unspecified", count: 1, averageMin: 85000, averageMax: 105000 },
    ]);
  });

  it("passes the skill match mode to extraction", () => {
    const trends = analyzeMarketTrends([{ description: "MongoDB" }], {
      skillMatchMode: "word_boundary",
    });
    assert.deepEqual(trends.topSkills, [{ name: "mongodb", count: 1 }]);
  });
});
