/**
 * swiftpick: Tool Definitions
 * Static MCP tool schema definitions.
 */
import type { Tool } from '@modelcontextprotocol/sdk/types.js';

const SESSION_ID = { type: 'string', description: 'Session ID returned by search_open' };

export const TOOLS: Tool[] = [
  {
    name: 'search_providers',
    description: 'List the search providers that can be opened.',
    inputSchema: {
      type: 'object',
      properties: {},
    },
  },
  {
    name: 'search_open',
    description:
      'Open a search session for a provider (files, grep, filer) or for an ad-hoc list of lines. Shows the unfiltered candidates when they are known.',
    inputSchema: {
      type: 'object',
      properties: {
        provider: { type: 'string', description: 'Provider id from search_providers' },
        cwd: { type: 'string', description: 'Working directory (defaults to the server cwd)' },
        lines: { type: 'array', items: { type: 'string' }, description: 'Candidates for an ad-hoc list session' },
        matcher: { type: 'string', enum: ['fuzzy', 'substring', 'regex'], default: 'fuzzy' },
        case_mode: { type: 'string', enum: ['smart', 'ignore', 'respect'], default: 'smart' },
      },
    },
  },
  {
    name: 'search_query',
    description:
      'Set the query of a session. Small candidate sets are filtered immediately; otherwise a search job starts after the debounce delay, or at once with flush.',
    inputSchema: {
      type: 'object',
      properties: {
        session_id: SESSION_ID,
        query: { type: 'string', description: 'Query text (max 1024 chars)' },
        flush: { type: 'boolean', default: false, description: 'Start a pending search job without waiting' },
      },
      required: ['session_id', 'query'],
    },
  },
  {
    name: 'search_results',
    description: 'Read the lines currently shown for a session, with the match-count indicator and any error.',
    inputSchema: {
      type: 'object',
      properties: {
        session_id: SESSION_ID,
        offset: { type: 'number', minimum: 0, default: 0 },
        limit: { type: 'number', minimum: 1, maximum: 1000, default: 100 },
      },
      required: ['session_id'],
    },
  },
  {
    name: 'search_load_more',
    description: 'Reveal result lines held back beyond the preload capacity.',
    inputSchema: {
      type: 'object',
      properties: {
        session_id: SESSION_ID,
        count: { type: 'number', minimum: 1, description: 'Lines to reveal (defaults to the preload capacity)' },
      },
      required: ['session_id'],
    },
  },
  {
    name: 'search_set_cwd',
    description: 'Change the working directory of a session and re-run its query.',
    inputSchema: {
      type: 'object',
      properties: {
        session_id: SESSION_ID,
        cwd: { type: 'string' },
      },
      required: ['session_id', 'cwd'],
    },
  },
  {
    name: 'search_abort',
    description: 'Stop the pending or running search job of a session. Lines already shown stay.',
    inputSchema: {
      type: 'object',
      properties: {
        session_id: SESSION_ID,
      },
      required: ['session_id'],
    },
  },
  {
    name: 'search_close',
    description: 'Close a session and stop its processes.',
    inputSchema: {
      type: 'object',
      properties: {
        session_id: SESSION_ID,
      },
      required: ['session_id'],
    },
  },
  {
    name: 'get_config',
    description: 'Show the effective configuration, open sessions and cached command outputs.',
    inputSchema: {
      type: 'object',
      properties: {},
    },
  },
];
