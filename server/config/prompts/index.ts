/**
 * Centralized Prompt Configuration
 *
 * Structure:
 * - system.ts: Base system prompts and chat-research personas
 * - research.ts: Code discovery, six-section APC analysis, section follow-up
 */

export * from "./system";
export * from "./research";
