import type { StageInfo, UserLevel } from "#roadmap/ai/roadmap/schemas.js";

type StageTemplate = Omit<StageInfo, "covered">;

function beginnerStages(topic: string): StageTemplate[] {
  return [
    {
      name: `Introduction to ${topic}`,
      description: `First contact with the vocabulary and scope of ${topic}.`,
      duration: "2 weeks",
      prerequisites: [],
      objectives: [`Explain what ${topic} is about`, "Learn the basic terminology"],
    },
    {
      name: `Fundamentals of ${topic}`,
      description: "The building blocks every later stage depends on.",
      duration: "4 weeks",
      prerequisites: [`Introduction to ${topic}`],
      objectives: ["Understand the fundamental principles", "Work through simple exercises"],
    },
    {
      name: `Core concepts of ${topic}`,
      description: "The central ideas of the field studied in depth.",
      duration: "6 weeks",
      prerequisites: [`Fundamentals of ${topic}`],
      objectives: ["Master the core concepts", "Connect ideas across topics"],
    },
    {
      name: `Practical ${topic}`,
      description: "Applying the concepts to realistic problems.",
      duration: "6 weeks",
      prerequisites: [`Core concepts of ${topic}`],
      objectives: ["Complete a guided project", "Apply techniques to new problems"],
    },
    {
      name: `Next steps in ${topic}`,
      description: "An overview of advanced directions to continue with.",
      duration: "4 weeks",
      prerequisites: [`Practical ${topic}`],
      objectives: ["Survey advanced topics", "Choose a specialisation"],
    },
  ];
}

function intermediateStages(topic: string): StageTemplate[] {
  return [
    {
      name: `Review of ${topic} essentials`,
      description: "A quick consolidation of what the learner already knows.",
      duration: "2 weeks",
      prerequisites: [],
      objectives: ["Identify weak spots", "Consolidate core terminology"],
    },
    {
      name: `Deepening ${topic}`,
      description: "Core concepts studied with more rigour.",
      duration: "6 weeks",
      prerequisites: [`Review of ${topic} essentials`],
      objectives: ["Study the theory behind common techniques", "Compare alternative approaches"],
    },
    {
      name: `Applied ${topic}`,
      description: "Larger projects that combine several techniques.",
      duration: "6 weeks",
      prerequisites: [`Deepening ${topic}`],
      objectives: ["Build an end-to-end project", "Evaluate results critically"],
    },
    {
      name: `Advanced ${topic}`,
      description: "An introduction to specialised material.",
      duration: "4 weeks",
      prerequisites: [`Applied ${topic}`],
      objectives: ["Read current literature", "Pick an area to specialise in"],
    },
  ];
}

function advancedStages(topic: string): StageTemplate[] {
  return [
    {
      name: `Advanced theory of ${topic}`,
      description: "Formal foundations of the specialised areas.",
      duration: "6 weeks",
      prerequisites: [],
      objectives: ["Master the formal treatment", "Prove or derive key results"],
    },
    {
      name: `Specialised ${topic}`,
      description: "Depth in one or two specialised areas.",
      duration: "8 weeks",
      prerequisites: [`Advanced theory of ${topic}`],
      objectives: ["Study a specialisation in depth", "Reproduce published results"],
    },
    {
      name: `Research frontiers in ${topic}`,
      description: "Open problems and current research directions.",
      duration: "6 weeks",
      prerequisites: [`Specialised ${topic}`],
      objectives: ["Survey recent research", "Formulate an open question"],
    },
  ];
}

/**
 * Template plan used when no usable plan could be generated. The number of
 * stages shrinks as the level rises.
 */
export function defaultStages(topic: string, level: UserLevel): StageInfo[] {
  const templates =
    level === "beginner"
      ? beginnerStages(topic)
      : level === "intermediate"
        ? intermediateStages(topic)
        : advancedStages(topic);
  return templates.map((stage) => ({ ...stage, covered: false }));
}
