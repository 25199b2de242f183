export const STRUCTURE_PLAN_PROMPT = `You are designing a self-study roadmap on "{topic}" for a learner at the {userLevel} level.

Knowledge areas to cover:
{focusAreas}

Split the roadmap into between 3 and 7 ordered stages. Use exactly this format for every stage:

Stage 1: <stage name>
Description: <one sentence>
Duration: <estimate, e.g. 4 weeks or 2 months>
Prerequisites: <comma separated, or None>
- <learning objective>
- <learning objective>

Stage names must be unique.{replanSection}`;

export const REPLAN_SECTION = `

This is a revision of an earlier plan:
{currentStages}

Apply this guidance when revising it:
{guidance}`;
