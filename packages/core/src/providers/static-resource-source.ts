import type { ResourceRequest, ResourceType } from "../types.js";
import type { ResourceSource } from "./resource-source.js";
import { hashString, stableStringify } from "../utils/stable-key.js";

type Section = Record<string, number | boolean>;

/** Fixed payloads for the demo domains used in walkthroughs */
const DEMO_DOMAINS: Record<string, Record<"technical_audit" | "content_analysis" | "authority", Section>> = {
  "example.com": {
    technical_audit: { issues_count: 23, critical_issues: 5, page_speed_score: 78, mobile_friendly: true, https_enabled: true },
    content_analysis: { pages_count: 156, avg_word_count: 850, duplicate_content_ratio: 0.05 },
    authority: { domain_rating: 45, referring_domains: 320, organic_keywords: 1840 },
  },
  "shop.example.org": {
    technical_audit: { issues_count: 41, critical_issues: 9, page_speed_score: 61, mobile_friendly: true, https_enabled: true },
    content_analysis: { pages_count: 2210, avg_word_count: 310, duplicate_content_ratio: 0.18 },
    authority: { domain_rating: 52, referring_domains: 780, organic_keywords: 9600 },
  },
  "legacy.example.io": {
    technical_audit: { issues_count: 67, critical_issues: 18, page_speed_score: 34, mobile_friendly: false, https_enabled: false },
    content_analysis: { pages_count: 95, avg_word_count: 420, duplicate_content_ratio: 0.11 },
    authority: { domain_rating: 21, referring_domains: 64, organic_keywords: 310 },
  },
};

/** mulberry32: small seeded PRNG so the same key always yields the same payload */
function seededRandom(seed: number): () => number {
  let state = seed;
  return () => {
    state = (state + 0x6d2b79f5) | 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function between(rand: () => number, min: number, max: number): number {
  return Math.floor(min + rand() * (max - min + 1));
}

function ratio(rand: () => number, max: number): number {
  return Math.round(rand() * max * 100) / 100;
}

type Generator = (key: string, parameters: Record<string, unknown>, rand: () => number) => Record<string, unknown>;

const GENERATORS: Record<ResourceType, Generator> = {
  seo_data: (key, _params, rand) => {
    const known: (typeof DEMO_DOMAINS)[string] | undefined = DEMO_DOMAINS[key];
    return {
      domain: key,
      technical_audit: known?.technical_audit ?? {
        issues_count: between(rand, 5, 80),
        critical_issues: between(rand, 0, 15),
        page_speed_score: between(rand, 30, 95),
        mobile_friendly: rand() > 0.2,
        https_enabled: rand() > 0.1,
      },
      content_analysis: known?.content_analysis ?? {
        pages_count: between(rand, 20, 3000),
        avg_word_count: between(rand, 250, 1800),
        duplicate_content_ratio: ratio(rand, 0.25),
      },
      authority: known?.authority ?? {
        domain_rating: between(rand, 5, 80),
        referring_domains: between(rand, 10, 2000),
        organic_keywords: between(rand, 50, 20000),
      },
    };
  },
  client_data: (key, _params, rand) => ({
    client_id: key,
    company_info: { employees: between(rand, 5, 5000), annual_revenue_usd: between(rand, 100, 50000) * 1000 },
    pipeline_stage: ["lead", "qualified", "proposal", "negotiation", "won"][between(rand, 0, 4)],
    lead_score: between(rand, 0, 100),
    active_projects: between(rand, 0, 6),
  }),
  competitive_data: (key, params, rand) => {
    const competitors = Array.isArray(params.competitors)
      ? params.competitors.filter((c): c is string => typeof c === "string")
      : [];
    return {
      domain: key,
      competitors: competitors.map((competitor) => ({
        domain: competitor,
        keyword_overlap: ratio(rand, 0.8),
        domain_rating: between(rand, 5, 90),
      })),
      content_gaps: between(rand, 0, 60),
    };
  },
  keyword_data: (key, _params, rand) => ({
    keyword: key,
    search_volume: between(rand, 10, 100000),
    difficulty: between(rand, 1, 100),
    cpc_usd: ratio(rand, 12),
  }),
  backlink_data: (key, _params, rand) => ({
    domain: key,
    total_backlinks: between(rand, 50, 200000),
    referring_domains: between(rand, 10, 5000),
    toxic_ratio: ratio(rand, 0.2),
  }),
  content_data: (key, _params, rand) => ({
    url: key,
    word_count: between(rand, 200, 4000),
    readability_score: between(rand, 30, 90),
    topical_coverage: ratio(rand, 1),
  }),
  technical_audit: (key, _params, rand) => ({
    domain: key,
    crawl_errors: between(rand, 0, 300),
    broken_links: between(rand, 0, 120),
    core_web_vitals: { lcp_ms: between(rand, 900, 6000), cls: ratio(rand, 0.4), inp_ms: between(rand, 50, 800) },
  }),
  analytics_data: (key, _params, rand) => ({
    property: key,
    sessions_30d: between(rand, 100, 500000),
    bounce_rate: ratio(rand, 0.9),
    conversion_rate: ratio(rand, 0.08),
  }),
};

/**
 * Deterministic local substitute for the primary source. Needs no network and
 * returns the same payload for the same request, tagged `substitute: true`.
 */
export class StaticResourceSource implements ResourceSource {
  readonly name: string;

  constructor(name = "static") {
    this.name = name;
  }

  async fetch(request: ResourceRequest): Promise<Record<string, unknown>> {
    const seed = hashString(`${request.resourceType}:${request.key}:${stableStringify(request.parameters)}`);
    const payload = GENERATORS[request.resourceType](request.key, request.parameters, seededRandom(seed));
    return { ...payload, substitute: true };
  }

  async search(resourceType: ResourceType, query: string): Promise<Record<string, unknown>[]> {
    if (resourceType !== "seo_data") return [];
    const needle = query.toLowerCase();
    return Object.keys(DEMO_DOMAINS)
      .filter((domain) => domain.includes(needle))
      .map((domain) => ({ domain, substitute: true }));
  }

  async ping(): Promise<boolean> {
    return true;
  }
}
