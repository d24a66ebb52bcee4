import { describe, expect, it } from "vitest";

import { GenerationRouter } from "../src/generation/router.js";
import { silentLogger } from "../src/logging/logger.js";
import {
  extractIndustryKeywords,
  extractTimeRange,
  parseJsonObject,
  parseKeywords,
  parseReportTypes,
  parseTimeRange,
  recommendReportTypes
} from "../src/pipeline/queryAnalysis.js";
import { PromptManager } from "../src/prompts/promptManager.js";
import { FakeProvider, SHORT_CONTEXT } from "./helpers.js";

const company = { companyId: "00126380", name: "Hanbit Semiconductor", industry: "semiconductor" };

function routerReplying(reply: (prompt: string) => string): GenerationRouter {
  const router = new GenerationRouter();
  router.register(new FakeProvider("friendli", SHORT_CONTEXT, reply));
  return router;
}

describe("parseJsonObject", () => {
  it("finds JSON wrapped in prose or code fences", () => {
    expect(parseJsonObject('Here you go:\n```json\n{"years": 5}\n```')).toEqual({ years: 5 });
    expect(parseJsonObject("no json here")).toBeUndefined();
    expect(parseJsonObject("{years: 5}")).toBeUndefined();
  });
});

describe("parseTimeRange", () => {
  it.each([
    ['{"years": 5, "reason": "explicit period"}', 5],
    ['{"years": 4.6}', 5],
    ['{"years": 25}', 10],
    ['{"years": 0}', 1],
    ['{"years": "five"}', 3],
    ["I cannot tell", 3]
  ])("reads %s as %i years", (reply, years) => {
    expect(parseTimeRange(reply, 3, 10)).toBe(years);
  });
});

describe("parseKeywords", () => {
  it("cleans and caps keywords", () => {
    expect(parseKeywords('{"keywords": [" AI ", "ai", "semiconductor", "", "HBM", "foundry"]}')).toEqual([
      "AI",
      "semiconductor",
      "HBM"
    ]);
    expect(parseKeywords('{"tags": ["AI"]}')).toEqual([]);
  });
});

describe("extractTimeRange", () => {
  const prompts = new PromptManager();

  it("asks the query analysis provider", async () => {
    const provider = new FakeProvider("friendli", SHORT_CONTEXT, () => '{"years": 7}');
    const router = new GenerationRouter();
    router.register(provider);

    const years = await extractTimeRange({
      router,
      prompts,
      query: "Seven-year margin trend?",
      defaultYears: 3,
      maxYears: 10,
      logger: silentLogger
    });
    expect(years).toBe(7);
    expect(provider.prompts[0]).toContain("Question: Seven-year margin trend?");
  });

  it("falls back to the default when generation fails", async () => {
    const router = routerReplying(() => {
      throw new Error("timeout");
    });
    const years = await extractTimeRange({
      router,
      prompts,
      query: "q",
      defaultYears: 3,
      maxYears: 10,
      logger: silentLogger
    });
    expect(years).toBe(3);
  });
});

describe("extractIndustryKeywords", () => {
  const prompts = new PromptManager();

  it("uses the model's keywords", async () => {
    const router = routerReplying(() => '{"keywords": ["HBM", "memory"]}');
    expect(
      await extractIndustryKeywords({ router, prompts, query: "HBM demand?", company, logger: silentLogger })
    ).toEqual(["HBM", "memory"]);
  });

  it("falls back to the registered industry", async () => {
    const empty = routerReplying(() => '{"keywords": []}');
    expect(
      await extractIndustryKeywords({ router: empty, prompts, query: "q", company, logger: silentLogger })
    ).toEqual(["semiconductor"]);

    const broken = routerReplying(() => {
      throw new Error("quota");
    });
    expect(
      await extractIndustryKeywords({
        router: broken,
        prompts,
        query: "q",
        company: { companyId: "X", name: "No Industry Co" },
        logger: silentLogger
      })
    ).toEqual([]);
  });
});

describe("parseReportTypes", () => {
  it("keeps known types in reply order", () => {
    expect(
      parseReportTypes('{"recommended_types": ["Quarterly", "prospectus", "annual", "quarterly"], "reason": "recent"}')
    ).toEqual(["quarterly", "annual"]);
  });

  it("falls back to annual and half-year reports", () => {
    expect(parseReportTypes('{"recommended_types": []}')).toEqual(["annual", "half-year"]);
    expect(parseReportTypes('{"recommended_types": ["prospectus"]}')).toEqual(["annual", "half-year"]);
    expect(parseReportTypes("annual reports")).toEqual(["annual", "half-year"]);
  });
});

describe("recommendReportTypes", () => {
  const prompts = new PromptManager();

  it("asks the query analysis provider", async () => {
    const provider = new FakeProvider("friendli", SHORT_CONTEXT, () => '{"recommended_types": ["material-event"]}');
    const router = new GenerationRouter();
    router.register(provider);

    expect(await recommendReportTypes({ router, prompts, query: "Any mergers?", logger: silentLogger })).toEqual([
      "material-event"
    ]);
    expect(provider.prompts[0]).toContain("Question: Any mergers?");
  });

  it("uses the defaults when generation fails", async () => {
    const router = routerReplying(() => {
      throw new Error("quota");
    });
    expect(await recommendReportTypes({ router, prompts, query: "q", logger: silentLogger })).toEqual([
      "annual",
      "half-year"
    ]);
  });
});
