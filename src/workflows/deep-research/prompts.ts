/**
 * Prompts for the deep research workflow.
 */

import type { RolePrompt } from "../../services/completion.ts";

/** Reviewers see at most this much of the draft */
const DRAFT_PREVIEW_CHARS = 4000;

const KEYWORD_RULE = "Make the queries short and use KEYWORDS only.";

const GROUNDING_RULES = [
  "Use information from ONLY the research notes.",
  "If no research notes are relevant, write a factual paragraph stating that no relevant information was found and that more research is needed.",
].join("\n");

export function buildOutlinePrompt(mainTopic: string): RolePrompt {
  return {
    user: [
      `Topic: ${mainTopic}`,
      "Create a logical outline for a comprehensive report on this topic.",
      "Return 4 to 6 distinct section headers (e.g., 'Historical Context', 'Technical Implementation').",
      "Do NOT include an Introduction or Conclusion; those are added later.",
      "The outline must be NEUTRAL and INVESTIGATIVE:",
      " - BAD: 'The Benefits of X' (assumes there are benefits)",
      " - GOOD: 'Analysis of the Impact of X'",
      " - BAD: 'How X Solves Y'",
      " - GOOD: 'Evaluation of X as a Solution for Y'",
      "Return ONLY the headers, one per line.",
    ].join("\n"),
  };
}

export function buildInitialQueriesPrompt(mainTopic: string, topic: string): RolePrompt {
  return {
    user: [
      `Main report topic: ${mainTopic}`,
      `Current section: ${topic}`,
      "Generate 3 specific search queries to gather information for this section.",
      "Return ONLY the queries, one per line.",
      KEYWORD_RULE,
    ].join("\n"),
  };
}

export function buildGapQueriesPrompt(topic: string, critiques: readonly string[]): RolePrompt {
  return {
    user: [
      `Section: ${topic}`,
      `Address these gaps: ${critiques.join("\n")}`,
      "Generate 2 NEW search queries to fill these gaps.",
      "Return ONLY the queries, one per line.",
      KEYWORD_RULE,
    ].join("\n"),
  };
}

export function buildSelectorPrompt(query: string, results: string): RolePrompt {
  return {
    user: `Query: ${query}\nSearch results:\n${results}\n\nReturn the single best URL for deep reading. Return ONLY the URL.`,
  };
}

export function buildExtractionPrompt(query: string, url: string, content: string): RolePrompt {
  return {
    user: [
      `Query: ${query}`,
      `Source: ${url}`,
      `Content: ${content}`,
      "",
      "Extract comprehensive findings, statistics and arguments.",
      "Format: [Fact] (Source: URL)",
      "If the source is not relevant to the query, answer [no relevant facts found] (Source: URL).",
    ].join("\n"),
  };
}

const WRITER_SYSTEM = "You are a technical writer.";

export function buildDraftPrompt(mainTopic: string, topic: string, notes: string): RolePrompt {
  return {
    system: WRITER_SYSTEM,
    user: [
      `Context: writing a report on '${mainTopic}'.`,
      `Section to write: ${topic}`,
      `Research notes:\n${notes}`,
      "",
      "Write this section only, without an introduction or conclusion for the whole report.",
      GROUNDING_RULES,
      "Use an academic tone. Cite sources inline [1].",
      "Output ONLY the section text.",
    ].join("\n"),
    temperature: 0.3,
  };
}

export function buildRevisionPrompt(topic: string, draft: string, notes: string): RolePrompt {
  return {
    system: WRITER_SYSTEM,
    user: [
      `Refine the section: ${topic}.`,
      `Current draft:\n${draft}`,
      "",
      `New notes:\n${notes}`,
      "",
      "Integrate the new findings and output the updated section.",
      "Decide whether the critiques are valid before integrating them.",
      GROUNDING_RULES,
      "Retain every cited source and its inline citation [1].",
    ].join("\n"),
    temperature: 0.3,
  };
}

function preview(draft: string): string {
  return `${draft.slice(0, DRAFT_PREVIEW_CHARS)}...`;
}

export function buildClaimQueryPrompt(draft: string): RolePrompt {
  return {
    user: [
      `Draft:\n${preview(draft)}`,
      "",
      "Identify one weak or unverified claim and generate a search query to check it.",
      "Output ONLY the search query.",
      KEYWORD_RULE,
    ].join("\n"),
    temperature: 0.1,
  };
}

export function buildCritiquePrompt(draft: string, query: string, evidence: string): RolePrompt {
  return {
    user: [
      `Draft:\n${preview(draft)}`,
      `Evidence found for '${query}':\n${evidence}`,
      "",
      "Critique the draft based on this evidence. Be harsh but constructive.",
      "If the evidence is not relevant, critique the draft's weak links instead.",
      "Include every critique you can think of.",
    ].join("\n"),
    temperature: 0.3,
  };
}

export function buildRefinePrompt(draft: string, critiques: readonly string[], notes: string): RolePrompt {
  return {
    user: [
      `Original draft:\n${draft}`,
      "",
      `Critiques:\n${critiques.join("\n")}`,
      "",
      `Notes:\n${notes}`,
      "",
      "Rewrite the draft to address the critiques. Preserve citations. Output the final section text.",
      "First decide whether each critique is worth addressing.",
    ].join("\n"),
    temperature: 0.25,
  };
}

export function buildEditorPrompt(mainTopic: string, body: string): RolePrompt {
  return {
    user: [
      `Topic: ${mainTopic}`,
      `Drafted sections:\n${body}`,
      "",
      "Instructions:",
      "1. Write a strong introduction summarizing the topic.",
      "2. Include the provided sections in order.",
      "3. Write a conclusion.",
      "4. Smooth out transitions between sections.",
      "5. Compile a 'References' section from the URLs cited in the text.",
      "6. Preserve the citations [1] where they belong.",
      "7. Turn bullet points into full paragraphs.",
      "Output the final Markdown report.",
    ].join("\n"),
    temperature: 0.2,
  };
}
