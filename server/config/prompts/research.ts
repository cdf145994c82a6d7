/**
 * Research Prompts
 *
 * Code discovery, the six-section APC analysis, and per-section follow-up.
 * Everything here is a pure function of its inputs; the audit window is
 * computed by the caller.
 */

import type { ConversationTurn, SectionChatTurn } from "@shared/schema";

/**
 * Outline titles in section order. The parser falls back to these when the
 * model omits a section or its title.
 */
export const RESEARCH_SECTION_TITLES = [
  "Code Description Analysis",
  "Guideline Examination",
  "Payment Rate Comparison",
  "Device Code Analysis",
  "NCCI Compliance Check",
  "Reference Material Review",
] as const;

export const CODE_DISCOVERY_COUNT = 5;

export function buildCodeDiscoveryPrompt(topic: string): string {
  return `
You are a medical coding expert. Given the following medical procedure or condition topic, provide the top ${CODE_DISCOVERY_COUNT} most relevant CPT codes.

Topic: ${topic}

For each CPT code, provide:
1. The CPT code number
2. A brief description (one line)

Format your response EXACTLY as follows (one code per line):
CODE: [5-digit code] | DESCRIPTION: [brief description]

Example format:
CODE: 99213 | DESCRIPTION: Office visit, established patient, moderate complexity
CODE: 99214 | DESCRIPTION: Office visit, established patient, high complexity

Provide exactly ${CODE_DISCOVERY_COUNT} CPT codes. If the topic is too vague or unclear, provide the most commonly associated codes.
`;
}

export function buildResearchPrompt(
  code: string,
  contextText: string,
  windowStart: string,
  windowEnd: string,
): string {
  return `
As a medical coding specialist focused on APC analysis, perform a thorough evaluation for CPT code: ${code}

Audit Window: ${windowStart} through ${windowEnd}

Context Information: ${contextText.trim() || "Not specified"}

Complete the following analysis sections:

SECTION 1 - ${RESEARCH_SECTION_TITLES[0]}
- Review detailed descriptions for ${code} and neighboring codes
- List neighboring codes in ASCENDING ORDER (from lowest to highest code number)
- Detect re-coding possibilities considering:
  • Procedural approach variations (open, percutaneous, laparoscopic)
  • Anatomical location differences
  • Intervention technique specifics
  • Potential bundling scenarios

SECTION 2 - ${RESEARCH_SECTION_TITLES[1]}
- Extract instructional notes specific to ${code}
- Summarize applicable chapter-level guidelines
- Note parenthetical references and code relationships

SECTION 3 - ${RESEARCH_SECTION_TITLES[2]}
- Evaluate APC assignments and payment rates for ${code} and related codes
- Present the comparison in a TABLE format with the following columns:
  | CPT Code | APC Code | Payment Rate | Status | Notes |
- Categorize findings:
  • Matching rates → No audit opportunity
  • Differing rates → Investigate further
- Track rate consistency across quarters/years within the audit window
- Flag potential underpayment or overpayment patterns

SECTION 4 - ${RESEARCH_SECTION_TITLES[3]}
- Confirm if ${code} involves medical devices
- List relevant HCPCS device codes
- Highlight common errors:
  • Procedure without device code
  • Device-procedure mismatch
  • Incorrect device type selection

SECTION 5 - ${RESEARCH_SECTION_TITLES[4]}
- Reference the NCCI Edit Manual for ${code}
- Examine PTP (Procedure-to-Procedure) edits
- Detect modifier abuse patterns:
  • Inappropriate modifier 59 usage
  • Modifier 25 misapplication
  • Other unbundling indicators

SECTION 6 - ${RESEARCH_SECTION_TITLES[5]}
- Locate CPT Assistant guidance for ${code}
- Find applicable HCPCS Coding Clinic articles
- Document special coding considerations

FINAL ASSESSMENT
- Consolidate findings and opportunities
- Assign priority level (Critical/Moderate/Low)
- Recommend validation steps

OUTPUT FORMAT (REQUIRED):
Wrap every section in its numbered tags, with the section title and body in their own tags:

<section_1>
<title>${RESEARCH_SECTION_TITLES[0]}</title>
<content>
...markdown body...
</content>
</section_1>

Repeat for <section_2> through <section_6>, then finish with:

<final_assessment>
...markdown body...
</final_assessment>

Use markdown bullet points inside <content>, and a markdown table where a table is requested. Do not write anything outside the tags.
`;
}

/**
 * Conversation for a follow-up question about one research section: the
 * section body as system context, prior turns for that section, then the
 * new question.
 */
export function buildSectionChatConversation(args: {
  code: string;
  sectionTitle: string;
  sectionContent: string;
  history: Pick<SectionChatTurn, "role" | "content">[];
  question: string;
}): ConversationTurn[] {
  const system = `You are an expert medical coding analyst answering follow-up questions about one section of an APC research report for CPT code ${args.code}.

Section: ${args.sectionTitle}

Section content:
${args.sectionContent.trim() || "(empty)"}

Answer using the section content as your primary context. Be concise and say so when the section does not cover the question.`;

  return [
    { role: "system", content: system },
    ...args.history.map(turn => ({ role: turn.role, content: turn.content })),
    { role: "user", content: args.question },
  ];
}
