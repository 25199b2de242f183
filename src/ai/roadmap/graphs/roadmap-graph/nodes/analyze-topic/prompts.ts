export const ANALYZE_TOPIC_PROMPT = `You are a curriculum designer mapping out the subject "{topic}".

List between 4 and 7 knowledge areas a learner must cover to master this subject.
Tag each area with the depth at which it is usually studied:
- introductory: first contact with the subject, no prior knowledge assumed
- core: the main body of the subject
- advanced: specialised or research-level material

Answer with one bullet per area and nothing else, using exactly this format:
- [introductory] Area name
- [core] Area name
- [advanced] Area name`;
