#!/usr/bin/env tsx
/**
 * Script to print a Gmail summary (labels, profile, last messages) as JSON
 *
 * Usage:
 *   GMAIL_ACCESS_TOKEN=<token> npm run gmail-summary [-- --max-results <n>]
 *
 * Examples:
 *   GMAIL_ACCESS_TOKEN=test-token npm run gmail-summary
 *   GMAIL_ACCESS_TOKEN=test-token npm run gmail-summary -- --max-results 5
 */

const { fetchGmailSummary } = await import(
  "../apps/backend/src/utils/gmail/summary.ts"
);
const { MAX_RESULTS_LIMIT } = await import(
  "../apps/backend/src/utils/gmail/config.ts"
);

async function main() {
  const args = process.argv.slice(2);

  if (args[0] === "--help" || args[0] === "-h") {
    console.log(`
Usage: npm run gmail-summary [-- options]

Environment:
  GMAIL_ACCESS_TOKEN         OAuth2 access token with a Gmail read scope (required)
  GMAIL_API_BASE_URL         Per-user Gmail API base URL
  GMAIL_REQUEST_TIMEOUT_MS   Timeout for each request in milliseconds
  GMAIL_MAX_RESULTS          Number of recent messages to fetch (1-${MAX_RESULTS_LIMIT})

Options:
  --max-results <n>       Override GMAIL_MAX_RESULTS
  --help, -h              Show this help message
    `);
    process.exit(0);
  }

  const accessToken = process.env.GMAIL_ACCESS_TOKEN;
  if (!accessToken) {
    console.error("❌ Error: GMAIL_ACCESS_TOKEN is required");
    console.error("Run 'npm run gmail-summary -- --help' for usage information");
    process.exit(1);
  }

  let maxResults: number | undefined;
  const maxResultsIndex = args.indexOf("--max-results");
  if (maxResultsIndex !== -1) {
    const value = args[maxResultsIndex + 1];
    maxResults = value ? parseInt(value, 10) : NaN;
    if (isNaN(maxResults) || maxResults <= 0 || maxResults > MAX_RESULTS_LIMIT) {
      console.error(`❌ Error: Invalid --max-results: ${value ?? ""}`);
      console.error(`--max-results must be between 1 and ${MAX_RESULTS_LIMIT}`);
      process.exit(1);
    }
  }

  try {
    const summary = await fetchGmailSummary(accessToken, { maxResults });
    console.log(JSON.stringify(summary, null, 2));
  } catch (error) {
    console.error(
      "❌ Error fetching Gmail summary:",
      error instanceof Error ? error.message : String(error)
    );
    if (error instanceof Error && error.stack) {
      console.error("\nStack trace:", error.stack);
    }
    process.exit(1);
  }
}

main().catch((error) => {
  console.error("❌ Unexpected error:", error);
  process.exit(1);
});
