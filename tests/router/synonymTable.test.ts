import { describe, it } from "mocha";
import { expect } from "chai";

import { ROUTER_ERROR_CODES, RoutingConfigurationError } from "../../src/router/errors.js";
import { SynonymTable } from "../../src/router/synonymTable.js";
import { FIXTURE_SYNONYMS } from "./fixtures.js";

describe("router/synonymTable", () => {
  const table = SynonymTable.fromGroups(FIXTURE_SYNONYMS);

  it("normalises surface forms regardless of case and spacing", () => {
    expect(table.normalize("  FAKTUR ")).to.equal("invoice");
    expect(table.normalize("Jatuh   Tempo")).to.equal("outstanding");
    expect(table.normalize("pelanggan")).to.equal("customer");
  });

  it("maps every canonical term onto itself", () => {
    for (const term of table.canonicalTerms()) {
      expect(table.normalize(term)).to.equal(term);
    }
    expect(table.canonicalTerms()).to.deep.equal(["invoice", "customer", "outstanding", "salesperson", "receivable"]);
  });

  it("returns null for unknown terms", () => {
    expect(table.normalize("spaceship")).to.equal(null);
    expect(table.normalize("")).to.equal(null);
    expect(table.has("spaceship")).to.equal(false);
  });

  it("keeps keys in declaration order and lists phrases longest first", () => {
    expect(table.keys().slice(0, 4)).to.deep.equal(["invoice", "faktur", "invoices", "tagihan"]);
    expect(table.size).to.equal(18);
    expect(table.phrases()).to.deep.equal(["belum lunas", "jatuh tempo", "per orang", "sales rep"]);
  });

  it("exposes the forms and tools of a canonical term", () => {
    expect(table.formsOf("customer")).to.deep.equal(["customer", "customers", "pelanggan", "client"]);
    expect(table.toolsFor("receivable")).to.deep.equal(["outstanding_by_customer", "ghost_tool"]);
    expect(table.toolsFor("unknown")).to.deep.equal([]);
    expect(Object.isFrozen(table.toolsFor("invoice"))).to.equal(true);
  });

  it("deduplicates the tools declared for a term", () => {
    const deduped = SynonymTable.fromGroups([
      { canonical: "invoice", forms: ["faktur"], tools: ["invoice_list_sales", " invoice_get_detail", "invoice_list_sales"] },
    ]);
    expect(deduped.toolsFor("invoice")).to.deep.equal(["invoice_list_sales", "invoice_get_detail"]);
  });

  it("accepts a form repeated under the same canonical term", () => {
    const repeated = SynonymTable.fromGroups([{ canonical: "invoice", forms: ["faktur", "Faktur", "invoice"] }]);
    expect(repeated.keys()).to.deep.equal(["invoice", "faktur"]);
  });

  it("rejects a form claimed by two canonical terms", () => {
    let caught: unknown;
    try {
      SynonymTable.fromGroups([
        { canonical: "receivable", forms: ["piutang"] },
        { canonical: "payable", forms: ["Piutang"] },
      ]);
    } catch (error) {
      caught = error;
    }
    expect(caught).to.be.instanceOf(RoutingConfigurationError);
    if (caught instanceof RoutingConfigurationError) {
      expect(caught.code).to.equal(ROUTER_ERROR_CODES.SYNONYM_CONFLICT);
      expect(caught.details).to.deep.equal({ form: "piutang", existing: "receivable", conflicting: "payable" });
    }
  });

  it("rejects blank forms", () => {
    expect(() => SynonymTable.fromGroups([{ canonical: "invoice", forms: ["   "] }]))
      .to.throw(RoutingConfigurationError)
      .with.property("code", ROUTER_ERROR_CODES.DATA_INVALID);
  });
});
