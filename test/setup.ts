import { afterEach, beforeEach } from "vitest";

// =============================================================================
// ENVIRONMENT ISOLATION
// =============================================================================

const GIT_IDENTITY = {
  GIT_AUTHOR_NAME: "stratum-test",
  GIT_AUTHOR_EMAIL: "stratum-test@example.com",
  GIT_COMMITTER_NAME: "stratum-test",
  GIT_COMMITTER_EMAIL: "stratum-test@example.com",
} as const;

let savedHome: string | undefined;

beforeEach(() => {
  // A developer's STRATUM_HOME must not leak state into tests.
  savedHome = process.env.STRATUM_HOME;
  delete process.env.STRATUM_HOME;
  Object.assign(process.env, GIT_IDENTITY);
});

afterEach(() => {
  if (savedHome === undefined) {
    delete process.env.STRATUM_HOME;
  } else {
    process.env.STRATUM_HOME = savedHome;
  }
});
