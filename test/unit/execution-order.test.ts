import { describe, it, expect } from "vitest";
import { explainExecutionOrder, maskComments, maskLiterals } from "../../src/core/execution-order";

function presentClauses(sql: string): string[] {
  return explainExecutionOrder(sql).filter((s) => s.present).map((s) => s.clause);
}

describe("explainExecutionOrder", () => {
  it("lists every clause in logical order with presence flags", () => {
    const steps = explainExecutionOrder("SELECT campaign_name FROM campaigns");

    expect(steps.map((s) => s.clause)).toEqual([
      "with", "from", "join", "where", "group-by", "having",
      "select", "window", "distinct", "order-by", "limit",
    ]);
    expect(steps.filter((s) => s.present).map((s) => [s.clause, s.step])).toEqual([
      ["from", 1],
      ["select", 2],
    ]);
    expect(steps.find((s) => s.clause === "where")?.step).toBeNull();
  });

  it("puts WHERE before SELECT and ORDER BY after it", () => {
    expect(presentClauses(
      "SELECT date, cost_micros / 1000000.0 AS cost_usd FROM ad_performance_daily " +
      "WHERE device = 'MOBILE' ORDER BY cost_usd DESC LIMIT 5",
    )).toEqual(["from", "where", "select", "order-by", "limit"]);
  });

  it("places WITH first even though SELECT is written before FROM", () => {
    const steps = explainExecutionOrder(
      "WITH daily AS (SELECT date, SUM(clicks) AS c FROM ad_performance_daily GROUP BY date) " +
      "SELECT date, LAG(c) OVER (ORDER BY date) FROM daily",
    );
    const present = steps.filter((s) => s.present);

    expect(present[0]).toMatchObject({ clause: "with", step: 1 });
    expect(present.map((s) => s.clause)).toEqual(["with", "from", "group-by", "select", "window", "order-by"]);
  });

  it("detects joins, grouping, having and distinct case-insensitively", () => {
    expect(presentClauses(
      "select distinct c.campaign_name from campaigns c inner join ad_groups g " +
      "on c.campaign_id = g.campaign_id group by c.campaign_name having count(*) > 1",
    )).toEqual(["from", "join", "group-by", "having", "select", "distinct"]);
  });

  it("ignores keywords inside string literals and comments", () => {
    expect(presentClauses(
      "SELECT 'where to limit' AS note -- order by later\nFROM campaigns /* group by */",
    )).toEqual(["from", "select"]);
  });

  it("does not match keywords inside identifiers", () => {
    expect(presentClauses("SELECT fromage, limited FROM campaigns")).toEqual(["from", "select"]);
  });

  it("keeps the text length when masking", () => {
    const sql = "SELECT 'it''s' FROM t";
    expect(maskLiterals(sql)).toBe(`SELECT ${" ".repeat(7)} FROM t`);
  });

  it("masks comments but keeps literals", () => {
    const sql = "/* x */ SELECT '--' -- y";
    expect(maskComments(sql)).toBe(`${" ".repeat(7)} SELECT '--' ${" ".repeat(4)}`);
  });
});
