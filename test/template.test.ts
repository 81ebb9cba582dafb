import { describe, expect, it } from "vitest";
import { buildInstruction, formatValue, placeholderRoots, renderTemplate } from "../src/pipeline/template.js";
import { defineTask } from "../src/pipeline/types.js";

describe("renderTemplate", () => {
  const ctx = {
    dependencies: {
      research: { gap_name: "Airport transfer", scores: [3, 5] },
      notes: "plain text",
    },
    inputs: { city: "Lisbon", year: 2024 },
  };

  it("substitutes whole dependency outputs and field paths", () => {
    expect(renderTemplate("Gap: {{research.gap_name}}; notes: {{ notes }}", ctx)).toBe(
      "Gap: Airport transfer; notes: plain text",
    );
  });

  it("substitutes run inputs", () => {
    expect(renderTemplate("{{inputs.city}} in {{inputs.year}}", ctx)).toBe("Lisbon in 2024");
  });

  it("indexes into arrays", () => {
    expect(renderTemplate("{{research.scores.1}}", ctx)).toBe("5");
  });

  it("renders objects as sorted-key JSON", () => {
    expect(renderTemplate("{{research}}", ctx)).toBe(
      '{\n  "gap_name": "Airport transfer",\n  "scores": [\n    3,\n    5\n  ]\n}',
    );
  });

  it("renders unknown roots and paths as empty", () => {
    expect(renderTemplate("[{{missing}}][{{research.nope}}]", ctx)).toBe("[][]");
  });
});

describe("placeholderRoots", () => {
  it("returns each root once, in order of appearance", () => {
    expect(placeholderRoots("{{b.x}} {{inputs.y}} {{a}} {{b}}")).toEqual(["b", "inputs", "a"]);
  });
});

describe("formatValue", () => {
  it("formats scalars and empties", () => {
    expect(formatValue(true)).toBe("true");
    expect(formatValue(null)).toBe("");
    expect(formatValue(undefined)).toBe("");
  });
});

describe("buildInstruction", () => {
  it("appends unreferenced dependencies, expected output and the schema", () => {
    const task = defineTask({
      id: "strategy",
      agent: "strategist",
      description: "Plan",
      instruction: "Build a plan for {{research.gap_name}}.",
      expectedOutput: "A short plan",
      dependsOn: ["research", "analysis"],
      outputSchema: { fields: [{ name: "plan", type: "string" }] },
    });

    const text = buildInstruction(task, {
      dependencies: { research: { gap_name: "Spa" }, analysis: "Demand is high" },
      inputs: {},
    });

    expect(text).toBe(
      [
        "Build a plan for Spa.",
        "Context from prior tasks:\n\n### analysis\nDemand is high",
        "Expected output:\nA short plan",
        "Give the final answer as a JSON object with these fields:\n- plan (string, required)",
      ].join("\n\n"),
    );
  });

  it("returns just the rendered instruction when there is nothing to add", () => {
    const task = defineTask({ id: "a", agent: "x", description: "", instruction: " Hello {{inputs.name}} ", dependsOn: [] });
    expect(buildInstruction(task, { dependencies: {}, inputs: { name: "crew" } })).toBe("Hello crew");
  });
});
