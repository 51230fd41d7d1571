/**
 * surfacewatch — MCP Resources
 *
 * Read-only resources for browsing findings, jobs and saved searches.
 */

import { ResourceTemplate, type McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type Database from 'better-sqlite3';
import { FindingRepository } from '../db/repository/finding-repository.js';
import { JobRepository } from '../db/repository/job-repository.js';
import { SavedSearchRepository } from '../db/repository/saved-search-repository.js';

function jsonContents(uri: URL, value: unknown) {
  return {
    contents: [
      {
        uri: uri.href,
        mimeType: 'application/json',
        text: JSON.stringify(value, null, 2),
      },
    ],
  };
}

export function registerResources(server: McpServer, db: Database.Database): void {
  const findingRepo = new FindingRepository(db);
  const jobRepo = new JobRepository(db);
  const savedSearchRepo = new SavedSearchRepository(db);

  // 1. surfacewatch://findings
  server.resource(
    'findings',
    'surfacewatch://findings',
    { description: 'Vulnerability findings' },
    async (uri) => jsonContents(uri, findingRepo.findAll()),
  );

  // 2. surfacewatch://findings/{level}
  server.resource(
    'findings-by-level',
    new ResourceTemplate('surfacewatch://findings/{level}', { list: undefined }),
    { description: 'Vulnerability findings of one level (critical, high, medium, low, info)' },
    async (uri, { level }) => {
      const wanted = Array.isArray(level) ? level[0] : level;
      return jsonContents(
        uri,
        findingRepo.findAll().filter((f) => f.level === wanted),
      );
    },
  );

  // 3. surfacewatch://jobs
  server.resource('jobs', 'surfacewatch://jobs', { description: 'Registered scan jobs' }, async (uri) =>
    jsonContents(uri, jobRepo.findAll()),
  );

  // 4. surfacewatch://searches
  server.resource(
    'searches',
    'surfacewatch://searches',
    { description: 'Saved regex searches' },
    async (uri) => jsonContents(uri, savedSearchRepo.findAll()),
  );
}
