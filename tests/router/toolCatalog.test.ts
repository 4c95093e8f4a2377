import { describe, it } from "mocha";
import { expect } from "chai";

import { ROUTER_ERROR_CODES, RoutingConfigurationError } from "../../src/router/errors.js";
import { KeywordScorer } from "../../src/router/keywordScorer.js";
import { SynonymTable } from "../../src/router/synonymTable.js";
import { ToolCatalog } from "../../src/router/toolCatalog.js";
import { FIXTURE_CATALOG, FIXTURE_SYNONYMS, FIXTURE_VOCABULARY } from "./fixtures.js";

describe("router/toolCatalog", () => {
  const synonyms = SynonymTable.fromGroups(FIXTURE_SYNONYMS);
  const scorer = new KeywordScorer(synonyms, FIXTURE_VOCABULARY);
  const catalog = ToolCatalog.build(FIXTURE_CATALOG, { synonyms, scorer });

  function keywordsOf(name: string): string[] {
    return Array.from(catalog.get(name)?.keywords ?? []).sort();
  }

  it("derives keywords from the tool name and hints", () => {
    expect(keywordsOf("contact_list")).to.deep.equal(["contact", "customer", "list", "suppliers"]);
    expect(keywordsOf("invoice_get_detail")).to.deep.equal(["detail", "invoice", "items", "line"]);
  });

  it("adds every canonical term whose tool list names the tool", () => {
    expect(keywordsOf("invoice_list_sales")).to.deep.equal(["bills", "invoice", "list", "outstanding", "sales", "unpaid"]);
    expect(keywordsOf("outstanding_by_customer")).to.deep.equal([
      "balances",
      "customer",
      "outstanding",
      "receivable",
      "unpaid",
    ]);
  });

  it("reports term tools missing from the catalog", () => {
    expect(catalog.unknownTermTools).to.deep.equal([{ term: "receivable", tool: "ghost_tool" }]);
  });

  it("keeps declaration order and exposes lookups", () => {
    expect(catalog.list().map((tool) => tool.name)).to.deep.equal(FIXTURE_CATALOG.map((entry) => entry.name));
    expect(catalog.size).to.equal(6);
    expect(catalog.has("contact_list")).to.equal(true);
    expect(catalog.get("ghost_tool")).to.equal(undefined);
    expect(catalog.get("contact_get_detail")?.params).to.deep.equal(["contact_id"]);
  });

  it("rejects duplicate tool names", () => {
    const duplicate = [...FIXTURE_CATALOG, { name: "contact_list", purpose: "Again", params: [] }];
    expect(() => ToolCatalog.build(duplicate, { synonyms, scorer }))
      .to.throw(RoutingConfigurationError)
      .with.property("code", ROUTER_ERROR_CODES.CATALOG_DUPLICATE);
  });
});
