import { describe, it } from "mocha";
import { expect } from "chai";

import { StructuredLogger, type LogEntry } from "../../src/logger.js";
import {
  PATTERN_ALTERNATIVE_SCORE,
  PATTERN_PRIMARY_SCORE,
  QueryRouter,
  ROUTER_ERROR_CODES,
  RoutingConfigurationError,
} from "../../src/router/index.js";
import { FIXTURE_CATALOG, FIXTURE_DATA, FIXTURE_PATTERNS, TODAY } from "./fixtures.js";

describe("router/queryRouter", () => {
  const router = QueryRouter.fromData(FIXTURE_DATA);

  describe("pattern hits", () => {
    it("returns the pattern tool with its declared confidence and params", () => {
      const result = router.route("Siapa yang hutang ke kita?", TODAY);

      expect(result.resolution).to.equal("pattern");
      expect(result.matchedPhrase).to.equal("siapa yang hutang ke kita");
      expect(result.keywords).to.deep.equal([]);
      expect(result.clarification).to.equal(null);
      expect(result.dateRange).to.equal(null);
      expect(result.suggestions).to.deep.equal([
        {
          tool: "invoice_list_sales",
          purpose: "List sales invoices",
          keyParams: ["search", "status_id", "date_from", "date_to"],
          suggestedParams: { status_id: 2 },
          score: PATTERN_PRIMARY_SCORE,
          confidence: "context-dependent",
        },
      ]);
    });

    it("appends the alternative tool and fills date parameters on both", () => {
      const result = router.route("who owes me money last week", TODAY);

      expect(result.dateRange).to.deep.equal({
        start: "2026-01-12",
        end: "2026-01-18",
        kind: "calendar",
        expression: "last week",
      });
      expect(
        result.suggestions.map(({ tool, score, confidence, suggestedParams }) => ({
          tool,
          score,
          confidence,
          suggestedParams,
        })),
      ).to.deep.equal([
        {
          tool: "outstanding_by_customer",
          score: PATTERN_PRIMARY_SCORE,
          confidence: "definitive",
          suggestedParams: { date_from: "2026-01-12", date_to: "2026-01-18" },
        },
        {
          tool: "invoice_list_sales",
          score: PATTERN_ALTERNATIVE_SCORE,
          confidence: "context-dependent",
          suggestedParams: { date_from: "2026-01-12", date_to: "2026-01-18" },
        },
      ]);
    });

    it("falls back to month-to-date for this_month patterns without a date phrase", () => {
      const result = router.route("top sales", TODAY);

      expect(result.dateRange).to.deep.equal({
        start: "2026-01-01",
        end: "2026-01-22",
        kind: "calendar",
        expression: "this month",
      });
      expect(result.suggestions[0].suggestedParams).to.deep.equal({ date_from: "2026-01-01", date_to: "2026-01-22" });
    });

    it("lets an explicit period override the this_month hint", () => {
      const result = router.route("top sales q4 2025", TODAY);

      expect(result.dateRange?.expression).to.equal("q4 2025");
      expect(result.suggestions[0].suggestedParams).to.deep.equal({ date_from: "2025-10-01", date_to: "2025-12-31" });
    });
  });

  describe("keyword ranking", () => {
    it("ranks tools by overlap plus the action verb bonus", () => {
      const result = router.route("daftar pelanggan", TODAY);

      expect(result.resolution).to.equal("keywords");
      expect(result.keywords).to.deep.equal(["customer", "daftar"]);
      expect(result.suggestions.map(({ tool, score }) => [tool, score])).to.deep.equal([
        ["contact_list", 1.5],
        ["contact_get_detail", 1],
        ["outstanding_by_customer", 1],
      ]);
      expect(result.suggestions.every((suggestion) => suggestion.confidence === "context-dependent")).to.equal(true);
    });

    it("treats English and Indonesian phrasings alike", () => {
      const english = router.route("overdue invoices", TODAY);
      const indonesian = router.route("faktur jatuh tempo", TODAY);

      expect(indonesian.keywords).to.deep.equal(["invoice", "outstanding"]);
      expect(indonesian.keywords).to.deep.equal(english.keywords);
      expect(indonesian.suggestions).to.deep.equal(english.suggestions);
      expect(english.suggestions.map(({ tool, score }) => [tool, score])).to.deep.equal([
        ["invoice_list_sales", 2],
        ["invoice_get_detail", 1],
        ["outstanding_by_customer", 1],
      ]);
    });

    it("corrects typos before scoring", () => {
      const result = router.route("custmer detail", TODAY);

      expect(result.keywords).to.deep.equal(["customer", "detail"]);
      expect(result.suggestions.map(({ tool, score }) => [tool, score])).to.deep.equal([
        ["contact_get_detail", 1.5],
        ["contact_list", 1],
        ["outstanding_by_customer", 1],
      ]);
    });

    it("clarifies queries made only of action verbs", () => {
      for (const query of ["detail", "rincian", "daftar", "list"]) {
        expect(router.route(query, TODAY).resolution, query).to.equal("clarify");
      }
    });

    it("removes the date phrase from the keywords and fills date parameters", () => {
      const result = router.route("overdue invoices last week", TODAY);

      expect(result.keywords).to.deep.equal(["invoice", "outstanding"]);
      expect(result.suggestions.map(({ tool, suggestedParams }) => [tool, suggestedParams])).to.deep.equal([
        ["invoice_list_sales", { date_from: "2026-01-12", date_to: "2026-01-18" }],
        ["invoice_get_detail", {}],
        ["outstanding_by_customer", { date_from: "2026-01-12", date_to: "2026-01-18" }],
      ]);
    });

    it("only strips the date phrase where it stands as a word", () => {
      const result = router.route("overdue invoices sku2024 2024", TODAY);

      expect(result.dateRange).to.deep.equal({
        start: "2024-01-01",
        end: "2024-12-31",
        kind: "calendar",
        expression: "2024",
      });
      expect(result.keywords).to.deep.equal(["invoice", "outstanding", "sku2024"]);
    });

    it("breaks ties alphabetically whatever the catalog order", () => {
      const reversed = QueryRouter.fromData({ ...FIXTURE_DATA, catalog: [...FIXTURE_CATALOG].reverse() });
      const expected = router.route("daftar pelanggan", TODAY).suggestions;
      expect(reversed.route("daftar pelanggan", TODAY).suggestions).to.deep.equal(expected);
    });

    it("limits the number of suggestions to topK", () => {
      const single = QueryRouter.fromData(FIXTURE_DATA, { topK: 1 });
      expect(single.route("faktur jatuh tempo", TODAY).suggestions.map((suggestion) => suggestion.tool)).to.deep.equal([
        "invoice_list_sales",
      ]);
      expect(QueryRouter.fromData(FIXTURE_DATA, { topK: 50 }).topK).to.equal(10);
      expect(QueryRouter.fromData(FIXTURE_DATA, { topK: 0 }).topK).to.equal(1);
      expect(router.topK).to.equal(5);
    });
  });

  describe("clarification", () => {
    it("asks for clarification when no tool scores", () => {
      const result = router.route("show me data", TODAY);

      expect(result).to.deep.equal({
        query: "show me data",
        suggestions: [],
        clarification:
          "Please be more specific about what you need, for example: invoice, customer, outstanding, salesperson, receivable.",
        dateRange: null,
        resolution: "clarify",
        matchedPhrase: null,
        keywords: ["data"],
      });
    });

    it("keeps the resolved date on clarification results", () => {
      const result = router.route("show me data from last month", TODAY);

      expect(result.resolution).to.equal("clarify");
      expect(result.dateRange).to.deep.equal({
        start: "2025-12-01",
        end: "2025-12-31",
        kind: "calendar",
        expression: "last month",
      });
    });

    it("handles empty queries", () => {
      const result = router.route("   ", TODAY);
      expect(result.resolution).to.equal("clarify");
      expect(result.keywords).to.deep.equal([]);
    });
  });

  describe("construction", () => {
    it("rejects patterns pointing at unknown tools", () => {
      const data = {
        ...FIXTURE_DATA,
        patterns: [
          ...FIXTURE_PATTERNS,
          { phrases: ["cash on hand"], tool: "financial_bank_balances", confidence: "definitive" as const },
        ],
      };
      let caught: unknown;
      try {
        QueryRouter.fromData(data);
      } catch (error) {
        caught = error;
      }
      expect(caught).to.be.instanceOf(RoutingConfigurationError);
      if (caught instanceof RoutingConfigurationError) {
        expect(caught.code).to.equal(ROUTER_ERROR_CODES.UNKNOWN_TOOL);
        expect(caught.details).to.deep.equal({ tool: "financial_bank_balances" });
      }
    });

    it("logs corrections without tripping payload redaction", () => {
      const entries: LogEntry[] = [];
      const logger = new StructuredLogger({
        level: "debug",
        redact: "on",
        sink: null,
        onEntry: (entry) => entries.push(entry),
      });
      QueryRouter.fromData(FIXTURE_DATA, { logger }).route("custmer detail", TODAY);

      const ranked = entries.find((entry) => entry.message === "router_ranked");
      expect(ranked?.payload).to.deep.equal({
        query: "custmer detail",
        keywords: ["customer", "detail"],
        corrections: [{ surface: "custmer", term: "customer" }],
        tools: [
          { tool: "contact_get_detail", score: 1.5 },
          { tool: "contact_list", score: 1 },
          { tool: "outstanding_by_customer", score: 1 },
        ],
      });
    });

    it("logs term tools missing from the catalog and routing decisions", () => {
      const entries: LogEntry[] = [];
      const logger = new StructuredLogger({ level: "debug", sink: null, onEntry: (entry) => entries.push(entry) });
      const logged = QueryRouter.fromData(FIXTURE_DATA, { logger });
      logged.route("top sales", TODAY);

      expect(entries.map(({ level, message, payload }) => ({ level, message, payload }))).to.deep.equal([
        { level: "warn", message: "router_term_tool_unknown", payload: { term: "receivable", tool: "ghost_tool" } },
        {
          level: "debug",
          message: "router_pattern_hit",
          payload: { query: "top sales", phrase: "top sales", tool: "financial_sales_by_person" },
        },
      ]);
    });
  });
});
