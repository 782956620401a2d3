#!/usr/bin/env node
/**
 * Course RAG MCP Server - CLI Entry Point
 *
 * Usage:
 *   course-rag-mcp                      # after npm install -g
 *   node dist/bin.js                    # direct invocation
 *
 * @module bin
 */

import './index.js';
