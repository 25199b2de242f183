export const RESEARCH_BOOKS_PROMPT = `Search the web for highly rated books for a {userLevel} learner studying "{topic}".

Stage: {stage}
Stage description: {description}
Objectives:
{objectives}{focus}

Only recommend books that exist, with ratings and review counts taken from a public book catalogue.
Exclude these titles, which are already known:
{exclude}

Answer with up to 5 books, separated by a line containing only ---, in exactly this format:
Title: <title>
Author: <author>
Year: <publication year>
Rating: <average rating>/5
Reviews: <number of reviews>
Why: <one sentence on why it fits this stage>`;

export const GAP_FOCUS_SECTION = `

Earlier searches left these gaps; prefer books that close them:
{gaps}`;
