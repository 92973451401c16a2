import { defineAgent, domainResources } from "../define-agent.js";

const SYSTEM_PROMPT = `You are a technical SEO auditor.

Audit the domain across crawlability, indexation, Core Web Vitals, mobile usability, structured data and internal linking. For each finding give severity (critical, high, medium, low), the affected URLs or templates, and the fix.`;

export const technicalSeoAuditor = defineAgent({
  id: "technical_seo_auditor",
  tier: "operational",
  description: "Runs technical audits and lists fixes by severity",
  capabilities: ["technical_seo_audit"],
  maxConcurrent: 3,
  system: SYSTEM_PROMPT,
  resources: domainResources("technical_audit", "seo_data"),
});
