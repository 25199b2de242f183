import { describe, expect, it } from "@jest/globals";
import type { KnowledgeArea } from "#roadmap/ai/roadmap/schemas.js";
import { createTestState } from "../../../../../test/scripted-generator.js";
import { runNode } from "../../../node-shared.js";
import { createAssessLevel, selectFocusAreas } from "../index.js";

const intro: KnowledgeArea = { name: "Basics", tier: "introductory" };
const core: KnowledgeArea = { name: "Regression", tier: "core" };
const advanced: KnowledgeArea = { name: "Transformers", tier: "advanced" };

describe("selectFocusAreas", () => {
  it("keeps every area for beginners", () => {
    expect(selectFocusAreas([intro, core, advanced], "beginner")).toEqual([intro, core, advanced]);
  });

  it("drops introductory areas for intermediate learners", () => {
    expect(selectFocusAreas([intro, core, advanced], "intermediate")).toEqual([core, advanced]);
  });

  it("keeps introductory areas when nothing else exists", () => {
    expect(selectFocusAreas([intro], "intermediate")).toEqual([intro]);
  });

  it("keeps only the advanced tier for advanced learners", () => {
    expect(selectFocusAreas([intro, core, advanced], "advanced")).toEqual([advanced]);
  });

  it("widens to core areas when no advanced area exists", () => {
    expect(selectFocusAreas([intro, core], "advanced")).toEqual([core]);
  });
});

describe("Evaluador_Nivel", () => {
  it("writes the focus areas for the state's level", async () => {
    const state = createTestState({ userLevel: "intermediate", knowledgeAreas: [intro, core] });

    await expect(runNode(createAssessLevel(), state)).resolves.toEqual({ focusAreas: [core] });
  });
});
