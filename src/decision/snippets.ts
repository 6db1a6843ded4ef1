import type { RuleCatalog } from "../rules/catalog.js";

export interface RegulationSnippet {
  readonly regulation_id: string;
  readonly title: string;
  readonly content: string;
  readonly source_url?: string;
  readonly jurisdiction?: string;
}

export const DEFAULT_SNIPPETS: readonly RegulationSnippet[] = [
  {
    regulation_id: "utah_social_media_act",
    title: "Utah Social Media Regulation Act - Minor Protections",
    content:
      "Social media services must restrict access for Utah users under 18 between 10:30 PM and 6:30 AM unless a parent or guardian consents.",
    jurisdiction: "Utah, USA",
  },
  {
    regulation_id: "ncmec_reporting",
    title: "NCMEC Mandatory Reporting Requirements",
    content:
      "Electronic service providers must report apparent child sexual abuse material to the National Center for Missing & Exploited Children.",
    jurisdiction: "United States",
  },
  {
    regulation_id: "eu_dsa",
    title: "EU Digital Services Act - Transparency Obligations",
    content:
      "Online platforms must publish transparency reports, offer notice-and-action flagging and provide an appeal route for moderation decisions.",
    jurisdiction: "European Union",
  },
  {
    regulation_id: "gdpr",
    title: "GDPR - Lawful Basis for Processing",
    content:
      "Processing personal data requires a lawful basis under Article 6, and data subjects may access, port, erase and object to processing of their data.",
    jurisdiction: "European Union",
  },
  {
    regulation_id: "coppa",
    title: "COPPA - Children's Online Privacy Protection",
    content:
      "Services directed to children under 13 must obtain verifiable parental consent before collecting personal information.",
    jurisdiction: "United States",
  },
];

const MIN_KEYWORD_LENGTH = 4;

/**
 * Snippets related to the matched rules, in snippet order. A snippet is
 * related to a rule when its id equals the lower-cased rule id, or when one
 * of the rule's regulation names shares a keyword with the snippet title.
 */
export function relevantSnippets(
  snippets: readonly RegulationSnippet[],
  matchedRuleIds: readonly string[],
  catalog?: RuleCatalog,
): RegulationSnippet[] {
  const ruleIds = new Set(matchedRuleIds.map((id) => id.toLowerCase()));
  const regulationKeywords = new Set(
    matchedRuleIds
      .flatMap((id) => catalog?.get(id)?.regulations ?? [])
      .flatMap((name) => keywords(name)),
  );

  return snippets.filter(
    (snippet) =>
      ruleIds.has(snippet.regulation_id.toLowerCase()) ||
      keywords(snippet.title).some((word) => regulationKeywords.has(word)),
  );
}

export function keywords(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter((word) => word.length >= MIN_KEYWORD_LENGTH);
}
