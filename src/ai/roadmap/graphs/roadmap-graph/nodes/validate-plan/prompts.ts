export const VALIDATE_PLAN_PROMPT = `Review this learning roadmap on "{topic}" for a {userLevel} learner.

Stages:
{stageSummary}

Known gaps:
{gaps}

Judge whether the stages are ordered sensibly, whether the difficulty suits the learner,
and whether each stage has enough good books.

Answer with a line "Score: <1-10>/10", followed by the main issues as bullets:
- <issue>`;
