import { describe, expect, it } from "vitest";
import { DEFAULT_CONFIG } from "../../src/config";
import { ParseError } from "../../src/core/errors";
import { buildResultSet, ResultStatusParser, summarizeResultSet } from "../../src/scrape";
import { pendingRow, readyRow, resultsPage } from "../helpers/portalFixtures";

const parser = new ResultStatusParser(DEFAULT_CONFIG.portalRules);

describe("ResultStatusParser", () => {
  it("marks a row ready only when it has the ready colour and the released status", () => {
    const resultSet = parser.parse(resultsPage([readyRow("Hemograma"), pendingRow("Glicose")]));

    expect(resultSet.items).toEqual([
      { label: "Hemograma", ready: true },
      { label: "Glicose", ready: false },
    ]);
    expect(resultSet.allReady).toBe(false);
  });

  it("reports allReady when every listed result is released", () => {
    const resultSet = parser.parse(resultsPage([readyRow("Hemograma"), readyRow("TSH")]));

    expect(resultSet.items.map((item) => item.ready)).toEqual([true, true]);
    expect(resultSet.allReady).toBe(true);
  });

  it("never reports allReady for an empty table", () => {
    const resultSet = parser.parse(resultsPage([]));

    expect(resultSet).toEqual({ items: [], allReady: false });
  });

  it("treats a coloured row without the status token as not ready", () => {
    const html = resultsPage(['<tr bgcolor="#8ff08f"><td>Ferritina</td><td>Em andamento</td></tr>']);

    expect(parser.parse(html).items).toEqual([{ label: "Ferritina", ready: false }]);
  });

  it("treats a released row without the colour as not ready", () => {
    const html = resultsPage(['<tr bgcolor="#ffffff"><td>Ferritina</td><td>Liberado</td></tr>']);

    expect(parser.parse(html).items).toEqual([{ label: "Ferritina", ready: false }]);
  });

  it("reads the colour from a cell's inline background-color style", () => {
    const html = resultsPage(['<tr><td style="font-weight: bold; background-color: #8FF08F">TSH</td><td>LIBERADO</td></tr>']);

    expect(parser.parse(html).items).toEqual([{ label: "TSH", ready: true }]);
  });

  it("skips signature and link rows", () => {
    const html = resultsPage([
      readyRow("Hemograma"),
      '<tr><td colspan="2">Assinatura eletrônica do responsável</td></tr>',
      '<tr><td><a href="/get_laudo?id=42">Visualizar Laudo</a></td></tr>',
    ]);

    expect(parser.parse(html)).toEqual({ items: [{ label: "Hemograma", ready: true }], allReady: true });
  });

  it("uses the first non-empty cell as the label", () => {
    const html = resultsPage(['<tr bgcolor="#8ff08f"><td> </td><td>  Vitamina   D </td><td>Liberado</td></tr>']);

    expect(parser.parse(html).items).toEqual([{ label: "Vitamina D", ready: true }]);
  });

  it("rejects a page without a result table", () => {
    expect(() => parser.parse("<html><body><p>Sessão encerrada</p></body></html>")).toThrow(ParseError);
    expect(() => parser.parse("<html><body></body></html>")).toThrow("results page has no result table");
  });

  it("honours custom readiness rules", () => {
    const custom = new ResultStatusParser({
      readyBackgroundColors: ["green"],
      readyStatusTokens: ["released"],
      ignoredRowTokens: [],
    });
    const html = resultsPage(['<tr style="background-color: Green"><td>Lipid panel</td><td>Released</td></tr>']);

    expect(custom.parse(html).items).toEqual([{ label: "Lipid panel", ready: true }]);
  });
});

describe("summarizeResultSet", () => {
  it("describes empty, partial and complete result sets", () => {
    expect(summarizeResultSet(buildResultSet([]))).toBe("no results listed yet");
    expect(
      summarizeResultSet(
        buildResultSet([
          { label: "A", ready: true },
          { label: "B", ready: false },
          { label: "C", ready: false },
        ]),
      ),
    ).toBe("1/3 results ready");
    expect(summarizeResultSet(buildResultSet([{ label: "A", ready: true }]))).toBe("all 1 results ready");
  });
});
