#!/usr/bin/env node
import 'dotenv/config';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { basename, join, resolve } from 'node:path';
import { loadConfig } from '../config.js';
import { ValidationError } from '../errors.js';
import { EXPORT_FORMATS, type ExportFormat } from '../types.js';
import { isExportFormat } from '../export/engine.js';
import { createRuntime } from '../runtime.js';
import type { SubmitResult } from '../service/documentService.js';
import { createFileStore, createMemoryStore } from '../storage/dataStore.js';

interface CliOptions {
  help: boolean;
  persist: boolean;
  input?: string;
  outDir: string;
  formats: ExportFormat[];
  projectName?: string;
  domain?: string;
  level?: string;
  docType?: string;
}

const VALUE_FLAGS = new Set(['--input', '--out', '--formats', '--name', '--domain', '--level', '--type']);

function parseArgs(argv: string[]): CliOptions {
  const values = new Map<string, string>();
  const flags = new Set<string>();

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const eq = arg.indexOf('=');
    const name = eq > 0 ? arg.slice(0, eq) : arg;

    if (!VALUE_FLAGS.has(name)) {
      flags.add(arg);
      continue;
    }
    if (eq > 0) {
      values.set(name, arg.slice(eq + 1));
      continue;
    }
    const next = argv[i + 1];
    if (next === undefined || next.startsWith('--')) {
      throw new Error(`Missing value for ${name}`);
    }
    values.set(name, next);
    i += 1;
  }

  const unknown = [...flags].filter((flag) => !['--help', '-h', '--persist'].includes(flag));
  if (unknown.length > 0) {
    throw new Error(`Unknown argument(s): ${unknown.join(' ')}`);
  }

  const formats = (values.get('--formats') ?? EXPORT_FORMATS.join(','))
    .split(',')
    .map((format) => format.trim().toLowerCase())
    .filter(Boolean);
  const unsupported = formats.filter((format) => !isExportFormat(format));
  if (unsupported.length > 0) {
    throw new Error(`Unsupported format(s): ${unsupported.join(', ')}`);
  }

  return {
    help: flags.has('--help') || flags.has('-h'),
    persist: flags.has('--persist'),
    input: values.get('--input'),
    outDir: values.get('--out') ?? 'output',
    formats: [...new Set(formats.filter(isExportFormat))],
    projectName: values.get('--name'),
    domain: values.get('--domain'),
    level: values.get('--level'),
    docType: values.get('--type'),
  };
}

function printUsage(): void {
  console.log(
    [
      'Usage:',
      '  npm run generate -- --input requirements.md [--out output] [--formats pdf,docx]',
      '',
      'Flags:',
      '  --input <path>     Requirements text file (required).',
      '  --out <dir>        Directory for the exported files. Default: output',
      '  --formats <list>   Comma-separated subset of pdf,docx,html,json. Default: all',
      '  --name <text>      Project name used in the document title.',
      '  --domain <text>    Business domain hint for the section agents.',
      '  --level <level>    simple | intermediate | advanced. Default: DOC_LEVEL',
      '  --type <type>      brd | sow | frd. Default: brd',
      '  --persist          Keep the session in DATA_DIR instead of memory.',
    ].join('\n'),
  );
}

async function main(): Promise<void> {
  let options: CliOptions;
  try {
    options = parseArgs(process.argv.slice(2));
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    printUsage();
    process.exitCode = 1;
    return;
  }

  if (options.help) {
    printUsage();
    return;
  }
  if (!options.input) {
    console.error('Refusing to run without --input.');
    printUsage();
    process.exitCode = 1;
    return;
  }

  const config = loadConfig();
  const store = options.persist ? await createFileStore(config.dataDir) : createMemoryStore();
  const { service } = createRuntime(config, store);
  const requirements = await readFile(options.input, 'utf-8');

  let submitted: SubmitResult;
  try {
    submitted = await service.submit(
      {
        requirements,
        originalFilename: basename(options.input),
        projectName: options.projectName,
        domain: options.domain,
        level: options.level,
        docType: options.docType,
      },
      { wait: true },
    );
  } catch (error) {
    if (error instanceof ValidationError) {
      console.error(error.message);
      process.exitCode = 1;
      return;
    }
    throw error;
  }

  if (submitted.status !== 'ready') {
    console.error(`Generation failed for ${submitted.fileId}: ${submitted.failureReason ?? 'unknown reason'}`);
    process.exitCode = 1;
    return;
  }

  const outDir = resolve(options.outDir);
  await mkdir(outDir, { recursive: true });
  for (const format of options.formats) {
    const response = await service.download(submitted.fileId, format);
    if (response.statusCode !== 200) {
      console.error(`Skipping ${format}: ${response.body.error}`);
      process.exitCode = 1;
      continue;
    }
    const target = join(outDir, response.artifact.filename);
    await writeFile(target, response.artifact.data);
    console.log(`Wrote ${target}`);
  }
}

main().catch((error) => {
  console.error('Document generation failed:', error);
  process.exitCode = 1;
});
