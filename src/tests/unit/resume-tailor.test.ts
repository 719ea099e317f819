import assert from "node:assert/strict";
import { describe, it } from "node:test";
import {
  analyzeResumeRequirements,
  generateCoverLetter,
  tailorResume,
  toExperienceLevel,
} from "../../resumes/resume-tailor";
import { ResumeJobRequirements } from "../../resumes/resume.types";

function requirementsFor(technicalSkills: string[]): ResumeJobRequirements {
  return {
    technicalSkills,
    softSkills: [],
    experienceLevel: "mid",
    education: "bachelors",
  };
}

describe("analyzeResumeRequirements", () => {
  it("collects technical and soft skills with a level", () => {
    assert.deepEqual(
      analyzeResumeRequirements(
        "Senior Python engineer with AWS. Strong communication. Master's degree.",
      ),
      {
        technicalSkills: ["python", "aws"],
        softSkills: ["communication"],
        experienceLevel: "senior",
        education: "masters",
      },
    );
  });

  it("maps required years to a level", () => {
    assert.equal(toExperienceLevel(0), "entry");
    assert.equal(toExperienceLevel(1), "entry");
    assert.equal(toExperienceLevel(3), "mid");
    assert.equal(toExperienceLevel(5), "senior");
  });
});

describe("tailorResume", () => {
  it("rewrites summary, skill order and experience highlights", () => {
    const tailored = tailorResume(
      {
        summary: "Backend developer.",
        skills: ["SQL", "AWS", "Python", "Go"],
        experience: [
          {
            title: "Engineer",
            company: "Initech",
            description: "Built python services on aws and javascript tooling.",
          },
        ],
        education: ["BSc Computer Science"],
      },
      requirementsFor(["python", "aws"]),
      { jobTitle: "Backend Engineer", companyName: "Globex" },
    );

    assert.deepEqual(tailored, {
      summary:
        "Experienced professional specializing in python, aws. Passionate about backend engineer role with proven expertise in python, aws. Backend developer.",
      skills: ["AWS", "Python", "SQL", "Go"],
      experience: [
        {
          title: "Engineer",
          company: "Initech",
          description: "Built **python** services on **aws** and javascript tooling.",
        },
      ],
      education: ["BSc Computer Science"],
      tailoredFor: { jobTitle: "Backend Engineer", companyName: "Globex" },
    });
  });

  it("prefers the longer skill when two overlap", () => {
    const tailored = tailorResume(
      {
        summary: "",
        skills: [],
        experience: [{ title: "Dev", company: "Acme", description: "javascript and java" }],
        education: [],
      },
      requirementsFor(["javascript", "java"]),
      { jobTitle: "Developer", companyName: "Acme" },
    );
    assert.equal(tailored.experience[0]?.description, "**javascript** and **java**");
  });

  it("turns a plain-text resume into a truncated summary", () => {
    const tailored = tailorResume("x".repeat(250), requirementsFor([]), {
      jobTitle: "Developer",
      companyName: "Acme",
    });
    assert.equal(tailored.summary, `${"x".repeat(200)}...`);
    assert.deepEqual(tailored.skills, []);
    assert.deepEqual(tailored.experience, []);
  });
});

describe("generateCoverLetter", () => {
  it("names the role, company and skills", () => {
    const letter = generateCoverLetter({
      jobTitle: "Backend Engineer",
      companyName: "Globex",
      requirements: requirementsFor(["python", "aws", "docker", "sql"]),
      candidateName: "Sam Taylor",
    });
    const lines = letter.split("\n");
    assert.equal(lines[0], "Dear Hiring Manager,");
    assert.equal(
      lines[2],
      "I am writing to express my strong interest in the Backend Engineer position at Globex.",
    );
    assert.equal(lines[3], "With my background in python, aws, docker, I am confident that I would be");
    assert.equal(lines[6], "My experience with python, aws, docker, sql aligns perfectly with your");
    assert.equal(lines[lines.length - 1], "Sam Taylor");
  });

  it("signs with a placeholder when no name is given", () => {
    const letter = generateCoverLetter({
      jobTitle: "Developer",
      companyName: "Acme",
      requirements: requirementsFor([]),
    });
    assert.ok(letter.endsWith("Best regards,\n[Your Name]"));
  });

  it("leaves out the skill sentences when the job names no skills", () => {
    const letter = generateCoverLetter({
      jobTitle: "Developer",
      companyName: "Acme",
      requirements: requirementsFor([]),
    });
    assert.deepEqual(letter.split("\n").slice(0, 6), [
      "Dear Hiring Manager,",
      "",
      "I am writing to express my strong interest in the Developer position at Acme.",
      "",
      "I am particularly excited about the opportunity to contribute to",
      "Acme's mission and grow within your innovative environment.",
    ]);
    assert.ok(!letter.includes("With my background in"));
  });
});
