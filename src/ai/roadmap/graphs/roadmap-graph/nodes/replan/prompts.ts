export const REPLAN_PROMPT = `A learning roadmap on "{topic}" failed review.

Current stages:
{stages}

Accepted books per stage:
{bookCounts}

Review feedback:
{feedback}

Stages that need more work: {affected}

In at most five bullet points, say how the stage structure should change so the roadmap passes review.
Keep the stages that worked.`;
