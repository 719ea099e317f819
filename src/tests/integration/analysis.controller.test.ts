import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { createAnalysisHandlers } from "../../api/analysis.controller";
import { Logger } from "../../config/logger";

class ResponseMock {
  statusCode = 0;
  body: unknown = undefined;

  status(code: number): this {
    this.statusCode = code;
    return this;
  }

  json(payload: unknown): this {
    this.body = payload;
    return this;
  }
}

const noopLogger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

function buildHandlers(marketTrendsMaxJobs = 100, logger: Logger = noopLogger) {
  return createAnalysisHandlers({
    logger,
    skillMatchMode: "substring",
    marketTrendsMaxJobs,
    now: () => new Date("2026-01-15T10:00:00.000Z"),
  });
}

function call(
  handler: ReturnType<typeof buildHandlers>["compatibility"],
  body: unknown,
): ResponseMock {
  const response = new ResponseMock();
  handler({ body } as never, response as never);
  return response;
}

describe("analysis controller", () => {
  it("returns the compatibility analysis", () => {
    const response = call(buildHandlers().compatibility, {
      jobDescription: "Requires 3+ years Python and AWS experience. Bachelor's degree required.",
      profile: { skills: ["python", "sql"], experienceYears: 2, education: "Bachelors" },
    });

    assert.equal(response.statusCode, 200);
    assert.deepEqual(response.body, {
      ok: true,
      analysis: {
        overallScore: 63,
        skillMatchScore: 50,
        experienceMatchScore: 60,
        educationMatchScore: 100,
        matchingSkills: ["python"],
        missingSkills: ["aws"],
        recommendations: [
          { type: "skill_gap", message: "Consider learning these skills: aws", priority: "medium" },
          { type: "experience_gap", message: "Gain 1 more years of experience", priority: "medium" },
        ],
        requirements: { skills: ["python", "aws"], experienceYears: 3, education: "bachelors" },
      },
      analyzedAt: "2026-01-15T10:00:00.000Z",
    });
  });

  it("answers 400 for an invalid profile", () => {
    const response = call(buildHandlers().compatibility, {
      jobDescription: "Python",
      profile: { skills: [], experienceYears: -3 },
    });
    assert.equal(response.statusCode, 400);
    assert.deepEqual(response.body, { ok: false, error: "invalid_experience_years" });
  });

  it("summarises market trends", () => {
    const response = call(buildHandlers().marketTrends, {
      jobs: [
        { description: "Python developer", company: "Acme" },
        { description: "Python and SQL", company: "Acme" },
        { description: "Senior Python engineer", company: "Globex" },
      ],
    });
    assert.equal(response.statusCode, 200);
    assert.deepEqual(response.body, {
      ok: true,
      trends: {
        topSkills: [
          { name: "python", count: 3 },
          { name: "sql", count: 1 },
        ],
        topCompanies: [
          { name: "Acme", count: 2 },
          { name: "Globex", count: 1 },
        ],
        totalAnalyzed: 3,
        salaryBands: [],
      },
      analyzedAt: "2026-01-15T10:00:00.000Z",
    });
  });

  it("logs how many postings a market trend request covered", () => {
    const infoCalls: Array<Record<string, unknown> | undefined> = [];
    const logger: Logger = {
      ...noopLogger,
      info(_message, meta) {
        infoCalls.push(meta);
      },
    };

    call(buildHandlers(100, logger).marketTrends, {
      jobs: [{ description: "Python" }, { description: "Docker" }],
    });

    assert.equal(infoCalls.length, 1);
    assert.equal(infoCalls[0]?.route, "market_trends");
    assert.equal(infoCalls[0]?.jobs_count, 2);
  });

  it("enforces the market trend job limit", () => {
    const response = call(buildHandlers(1).marketTrends, {
      jobs: [{ description: "" }, { description: "" }],
    });
    assert.equal(response.statusCode, 400);
    assert.deepEqual(response.body, { ok: false, error: "too_many_jobs" });
  });

  it("ranks job listings", () => {
    const response = call(buildHandlers().jobRelevance, {
      jobs: [
        { title: "Python Developer", description: "Django services" },
        { title: "Frontend Engineer", description: "React and CSS" },
      ],
      skills: ["react", "css"],
      keywords: "react",
    });
    assert.equal(response.statusCode, 200);
    assert.deepEqual(response.body, {
      ok: true,
      jobs: [
        {
          title: "Frontend Engineer",
          description: "React and CSS",
          relevanceScore: 100,
          matchingSkills: ["react", "css"],
        },
      ],
      totalFound: 1,
    });
  });

  it("builds a tailored resume with default target", () => {
    const response = call(buildHandlers().tailoredResume, {
      jobDescription: "Python and Docker. Junior role.",
      baseResume: "Graduate developer.",
    });
    assert.equal(response.statusCode, 200);
    assert.deepEqual(response.body, {
      ok: true,
      tailoredResume: {
        summary:
          "Experienced professional specializing in python, docker. Passionate about software developer role with proven expertise in python, docker. Graduate developer.",
        skills: [],
        experience: [],
        education: [],
        tailoredFor: { jobTitle: "Software Developer", companyName: "Target Company" },
      },
      coverLetter: [
        "Dear Hiring Manager,",
        "",
        "I am writing to express my strong interest in the Software Developer position at Target Company.",
        "With my background in python, docker, I am confident that I would be",
        "a valuable addition to your team.",
        "",
        "My experience with python, docker aligns perfectly with your",
        "requirements. I am particularly excited about the opportunity to contribute to",
        "Target Company's mission and grow within your innovative environment.",
        "",
        "I have attached my resume for your review and would welcome the opportunity to",
        "discuss how my skills and enthusiasm can benefit your team.",
        "",
        "Thank you for your consideration.",
        "",
        "Best regards,",
        "[Your Name]",
      ].join("\n"),
      jobRequirements: {
        technicalSkills: ["python", "docker"],
        softSkills: [],
        experienceLevel: "entry",
        education: "high_school",
      },
    });
  });
});
