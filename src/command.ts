import { readFileSync, existsSync } from 'node:fs';
import { basename, resolve } from 'node:path';
import { resolveConfig, getConfigSummary, DEFAULT_CONFIG } from './config.js';
import type { AnalyzerConfigOptions } from './config.js';
import { ContractAnalyzer } from './pipeline.js';
import { kindFromFilename, kindFromName } from './extraction/index.js';
import { findClauseMatches, TAXONOMIES } from './clauses/index.js';
import { failedAnalyses, formatReport, serializeNarrative } from './format.js';
import { formatError } from './utils/errors.js';
import type { ClauseMatches, ContractDocument, SupportedModel } from './types.js';

export interface CLIOptions {
  file: string;
  type?: string;
  model?: SupportedModel;
  timeout?: number;
  parallel?: boolean;
  previewOnly?: boolean;
  clausesOnly?: boolean;
  explain?: boolean;
  json?: boolean;
  verbose?: boolean;
  help?: boolean;
}

export function parseArgs(args: string[]): CLIOptions {
  const options: CLIOptions = {
    file: '',
  };

  let i = 0;
  while (i < args.length) {
    const arg = args[i];

    if (arg === '--model' || arg === '-m') {
      options.model = args[++i];
    } else if (arg === '--type' || arg === '-t') {
      options.type = args[++i];
    } else if (arg === '--timeout') {
      options.timeout = parseInt(args[++i], 10);
    } else if (arg === '--parallel' || arg === '-p') {
      options.parallel = true;
    } else if (arg === '--preview-only') {
      options.previewOnly = true;
    } else if (arg === '--clauses-only') {
      options.clausesOnly = true;
    } else if (arg === '--explain') {
      options.explain = true;
    } else if (arg === '--json') {
      options.json = true;
    } else if (arg === '--verbose' || arg === '-v') {
      options.verbose = true;
    } else if (arg === '--help' || arg === '-h') {
      options.help = true;
    } else if (!arg.startsWith('-') && !options.file) {
      options.file = arg;
    }

    i++;
  }

  return options;
}

function printHelp(): void {
  console.log(`
Contract Analyzer CLI

Usage:
  contract-analyzer <file> [options]

Arguments:
  file                      Contract to analyze (.pdf, .docx or .txt)

Options:
  -t, --type <type>         Treat the file as docx, pdf or text regardless of extension
  -m, --model <model>       Model to use (default: ${DEFAULT_CONFIG.model})
  --timeout <ms>            Per-request timeout (default: ${DEFAULT_CONFIG.timeout})
  -p, --parallel            Issue the five analysis requests concurrently
  --preview-only            Only extract and print the text preview
  --clauses-only            Only run the clause presence checker (no API calls)
  --explain                 Show which phrases matched each present clause
  --json                    Print the report as JSON
  -v, --verbose             Log each extraction and API call
  -h, --help                Show this help message

Environment:
  OPENAI_API_KEY            Required for OpenAI models
  ANTHROPIC_API_KEY         Required for Claude models
  CONTRACT_ANALYZER_*       See README for every setting (.env is loaded)
`);
}

function loadDocument(options: CLIOptions): ContractDocument {
  const filePath = resolve(options.file);
  if (!existsSync(filePath)) {
    throw new Error(`File not found: ${filePath}`);
  }

  return {
    kind: options.type ? kindFromName(options.type) : kindFromFilename(filePath),
    data: readFileSync(filePath),
    name: basename(filePath),
  };
}

function explainMatches(text: string): { commercial: ClauseMatches; legal: ClauseMatches } {
  return {
    commercial: findClauseMatches(text, TAXONOMIES.commercial),
    legal: findClauseMatches(text, TAXONOMIES.legal),
  };
}

/**
 * Run the CLI and return its exit code.
 */
export async function runCli(args: string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
  if (args.length === 0) {
    printHelp();
    return 1;
  }

  const options = parseArgs(args);

  if (options.help) {
    printHelp();
    return 0;
  }

  if (!options.file) {
    console.error('Error: A contract file is required');
    printHelp();
    return 1;
  }

  const configOptions: AnalyzerConfigOptions = {
    model: options.model,
    timeout: options.timeout,
    parallel: options.parallel,
    verbose: options.verbose,
  };

  try {
    // Every mode fails here, before the file is read, when the API key is absent
    const config = resolveConfig(configOptions, env);
    if (config.verbose) {
      console.log(getConfigSummary(config));
    }

    const analyzer = new ContractAnalyzer(config);
    const document = loadDocument(options);
    const extraction = await analyzer.extract(document);
    const preview = analyzer.preview(extraction.text);
    const matches = options.explain ? explainMatches(extraction.text) : undefined;

    if (options.previewOnly) {
      console.log(options.json ? JSON.stringify({ ...extraction, preview }, null, 2) : preview);
      return 0;
    }

    if (options.clausesOnly) {
      const clauses = analyzer.checkClauses(extraction.text);
      console.log(
        options.json
          ? JSON.stringify({ extraction, preview, clauses, matches }, null, 2)
          : formatReport({ preview, clauses }, { matches, clausesOnly: true })
      );
      return 0;
    }

    if (!options.json) {
      console.log(`Extracted ${extraction.characterCount.toLocaleString()} characters from ${document.name}`);
      console.log('Analyzing...');
    }

    const { narrative, clauses } = await analyzer.analyze(extraction.text);

    if (options.json) {
      console.log(
        JSON.stringify(
          { extraction, preview, narrative: serializeNarrative(narrative), clauses, matches },
          null,
          2
        )
      );
    } else {
      console.log('');
      console.log(formatReport({ preview, narrative, clauses }, { matches }));

      const usage = analyzer.getLogger().getTotalUsage();
      console.log('');
      console.log(`Tokens: ${usage.totalTokens.toLocaleString()} (${usage.promptTokens.toLocaleString()} prompt)`);
    }

    const failed = failedAnalyses(narrative);
    if (failed.length > 0) {
      console.error(`\n${failed.length} of 5 analyses failed: ${failed.join(', ')}`);
      return 1;
    }
    return 0;
  } catch (error) {
    console.error(`\n${formatError(error)}`);
    return 1;
  }
}
