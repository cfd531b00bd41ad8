import { UnknownToolError } from '../lib/errors';

export type ToolFolders = {
  input: string;
  results: string;
  status: string;
};

export type ToolConfig = {
  id: ToolId;
  name: string;
  description: string;
  bucket: string;
  folders: ToolFolders;
};

const defaultFolders: ToolFolders = { input: 'input', results: 'results', status: 'status' };

export const TOOLS = {
  contact_scraper: {
    name: 'Contact Scraper',
    description: 'Extract contact job profiles',
    bucket: 'contact-scraper-bucket',
  },
  name_cleaner: {
    name: 'Name Cleaner',
    description: 'Clean and standardize company names',
    bucket: 'name-cleaner-bucket',
  },
  lead_search: {
    name: 'Lead Search Agent',
    description: 'Find and validate business leads',
    bucket: 'leadsearchagent',
  },
  company_relationship: {
    name: 'Company Relationship Verifier',
    description: 'Verify company relationships using AI analysis',
    bucket: 'companyrelationship',
  },
  website_resolver: {
    name: 'Website Resolver',
    description: 'Verify company website relationships',
    bucket: 'website-resolver-bucket',
  },
  domain_relationship: {
    name: 'Domain Relationship Analyzer',
    description: 'Analyze relationships between domain pairs',
    bucket: 'domain-relationship-bucket',
  },
} as const satisfies Record<string, { name: string; description: string; bucket: string }>;

export type ToolId = keyof typeof TOOLS;

export function isToolId(value: string): value is ToolId {
  return Object.prototype.hasOwnProperty.call(TOOLS, value);
}

export function getToolConfig(toolId: string, bucketOverrides: Record<string, string> = {}): ToolConfig {
  if (!isToolId(toolId)) {
    throw new UnknownToolError(toolId);
  }
  const base = TOOLS[toolId];
  return {
    id: toolId,
    name: base.name,
    description: base.description,
    bucket: bucketOverrides[toolId] ?? base.bucket,
    folders: { ...defaultFolders },
  };
}
