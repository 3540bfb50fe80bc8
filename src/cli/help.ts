/**
 * @fileoverview Detailed help text for lexlocator CLI commands
 */

const HELP_TEXT = {
  main: `
lexlocator - Locate the paragraph that justifies an answer to a legal question

USAGE:
    lexlocator <command> [options]

COMMANDS:
    ingest <dir>        Index every *.json document in a directory
    search "<query>"    Run one hybrid search and print the paragraphs
    find                Locate the justifying paragraph for a question
    serve               Start the HTTP API
    status              Show index statistics and configuration
    help [command]      Show help for a command

GLOBAL OPTIONS:
    -h, --help          Show help information
    -v, --version       Show version information
    --json              Print results and errors as JSON

CONFIGURATION (environment or .env):
    LEXLOCATOR_DB_PATH               SQLite index file (default ./data/storage/lexlocator.sqlite)
    LEXLOCATOR_TOP_K                 Paragraphs per search (default 5)
    LEXLOCATOR_RRF_K                 Rank fusion constant (default 60)
    LEXLOCATOR_MAX_ITERATIONS        Search budget per question (default 5)
    LEXLOCATOR_LLM_TIMEOUT_MS        Bound on each reasoning call (default 60000)
    LEXLOCATOR_SEARCH_TIMEOUT_MS     Bound on each index call (default 10000)
    LEXLOCATOR_MIN_PARAGRAPH_LENGTH  Shorter paragraphs are not indexed (default 30)
    LEXLOCATOR_EMBEDDING_PROVIDER    bedrock | openai (default bedrock)
    LEXLOCATOR_EMBEDDING_MODEL       Embedding model id
    LEXLOCATOR_REASONING_PROVIDER    openai | bedrock (default openai)
    LEXLOCATOR_REASONING_MODEL       Reasoning model id (required for bedrock)
    LEXLOCATOR_LLM_BASE_URL          OpenAI-compatible endpoint
    LEXLOCATOR_LOG_LEVEL             debug | info | warn | error | silent (default info)
    OPENAI_API_KEY                   Key for the openai provider
    AWS_REGION                       Region for the bedrock provider (default us-east-1)
    PORT                             HTTP port for serve (default 8000)

ERROR HANDLING:
    With --json, errors are printed to stderr as
    { "error": { "code", "message", "retryable", "recoveryHints", "context" } }

    Exit codes:
    - 10-19  index and storage errors
    - 20-29  lookup errors (not found, iteration limit, malformed answer, timeout)
    - 30-39  provider and credential errors
    - 50-59  invalid arguments and missing files

For more information on a specific command, run:
    lexlocator help <command>
`,

  ingest: `
lexlocator ingest - Index source documents

USAGE:
    lexlocator ingest <dir> [--recreate] [--batch-size N]

OPTIONS:
    --recreate          Drop the existing index before ingesting
    --batch-size N      Paragraphs embedded and committed together (default 32)
    --json              Print the summary as JSON

DESCRIPTION:
    Reads every *.json file in <dir> (sorted by name). Each file holds one
    document: {"id", "chapters": [{"id", "paragraphs": [{"id", "content"}]}]}.
    HTML is stripped from paragraph content; paragraphs shorter than
    LEXLOCATOR_MIN_PARAGRAPH_LENGTH are skipped. Malformed files are reported
    and skipped.

    Only one ingest may write to an index at a time.

EXAMPLES:
    lexlocator ingest ./raw_data
    lexlocator ingest ./raw_data --recreate
`,

  search: `
lexlocator search - Run one hybrid search

USAGE:
    lexlocator search "<query>" [--limit N] [--keyword-only]

OPTIONS:
    --limit N           Number of paragraphs (default LEXLOCATOR_TOP_K)
    --keyword-only      Skip the vector index; needs no embedding provider
    --json              Print the paragraphs as JSON

EXAMPLES:
    lexlocator search "inspection group III"
    lexlocator search "earthing" --keyword-only --limit 10
`,

  find: `
lexlocator find - Locate the justifying paragraph for a question

USAGE:
    lexlocator find --question "<text>" --answer "<correct answer>" [--answer ...]

OPTIONS:
    --question <text>   The question
    --answer <text>     A correct answer; repeat for several
    --json              Print the location as JSON

DESCRIPTION:
    Runs the query-refinement loop: the reasoning engine searches the index
    until it names the paragraph that justifies the answer, reports that none
    exists, or spends LEXLOCATOR_MAX_ITERATIONS searches.

EXAMPLES:
    lexlocator find --question "Who may inspect alone?" --answer "Group III staff"
`,

  serve: `
lexlocator serve - Start the HTTP API

USAGE:
    lexlocator serve [--port N] [--host H]

OPTIONS:
    --port N            Port to listen on (default PORT or 8000)
    --host H            Interface to bind (default all)

ENDPOINTS:
    GET  /                 Welcome message
    GET  /health           Liveness
    POST /find_paragraph   {"question": {"text"}, "answers": [...], "correctAnswers": [...]}
                           200 {"doc_id", "chapter_id", "paragraph_id"}
                           404 not found or iteration limit; 422 invalid request;
                           500 malformed engine output or internal fault

EXAMPLES:
    lexlocator serve --port 8080
`,

  status: `
lexlocator status - Show index statistics

USAGE:
    lexlocator status [--json]

DESCRIPTION:
    Prints the database path, paragraph, document and vector counts, the
    vector collection's dimension and model, and the configured providers.
`,
};

export function showHelp(command?: string): void {
  if (command && command in HELP_TEXT) {
    console.log(getCommandHelp(command));
  } else if (command) {
    console.log(`Unknown command: ${command}`);
    console.log(HELP_TEXT.main);
  } else {
    console.log(HELP_TEXT.main);
  }
}

export function getCommandHelp(command: string): string {
  switch (command) {
    case 'ingest':
    case 'search':
    case 'find':
    case 'serve':
    case 'status':
      return HELP_TEXT[command];
    default:
      return HELP_TEXT.main;
  }
}
