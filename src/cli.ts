#!/usr/bin/env node

import * as fs from 'node:fs';
import * as path from 'node:path';
import { globby } from 'globby';
import { resolveConfig, type EngineConfig } from './core/config.js';
import { isDiagramError } from './core/errors.js';
import { textReport, toJsonResult, type OutputFormat } from './core/format.js';
import { kindFromPath, SOURCE_EXTENSIONS } from './core/router.js';
import { DiagramRenderer, type RenderResult } from './renderer/index.js';

function printUsage() {
    console.log('Usage: static-diagrams render <type> <input|-> [output]');
    console.log('       static-diagrams <directory>');
    console.log('  - "render" draws one diagram; <type> is flowchart, gantt, sequence, class-diagram (or class) or state');
    console.log(`  - A directory is scanned recursively for ${SOURCE_EXTENSIONS.map((e) => `*${e}`).join(', ')} files;`);
    console.log('    each is rendered to an .html fragment next to it (or under --out)');
    console.log('Options:');
    console.log('  --title, -t       Title shown above the diagram (render only)');
    console.log('  --format, -f      Output format: html|svg|json (default: html)');
    console.log('  --config, -c      JSON file with engine configuration');
    console.log('  --occurrence      Occurrence index mixed into the diagram id (render only)');
    console.log('  --out, -o         Output directory (directory mode)');
    console.log('  --include, -I     Glob(s) to include (repeatable or comma-separated)');
    console.log('  --exclude, -E     Glob(s) to exclude (repeatable or comma-separated)');
}

interface CliOptions {
    format: OutputFormat;
    title?: string;
    configPath?: string;
    occurrence: number;
    outDir?: string;
    include: string[];
    exclude: string[];
    positionals: string[];
}

function fail(message: string): never {
    console.error(`Error: ${message}`);
    process.exit(1);
}

function parseArgs(args: string[]): CliOptions {
    const opts: CliOptions = { format: 'html', occurrence: 0, include: [], exclude: [], positionals: [] };
    const splitGlobs = (v: string) => v.split(',').map((s) => s.trim()).filter(Boolean);
    for (let i = 0; i < args.length; i++) {
        const a = args[i] ?? '';
        const v = args[i + 1];
        if (a === '--format' || a === '-f') {
            const f = (v ?? '').toLowerCase();
            if (f !== 'html' && f !== 'svg' && f !== 'json') fail(`Unknown format "${v ?? ''}" (expected html, svg or json)`);
            opts.format = f;
            i++;
            continue;
        }
        if ((a === '--title' || a === '-t') && v !== undefined) { opts.title = v; i++; continue; }
        if ((a === '--config' || a === '-c') && v !== undefined) { opts.configPath = v; i++; continue; }
        if ((a === '--out' || a === '-o') && v !== undefined) { opts.outDir = v; i++; continue; }
        if (a === '--occurrence' && v !== undefined) {
            const n = Number(v);
            if (!Number.isInteger(n) || n < 0) fail(`--occurrence expects a non-negative integer, got "${v}"`);
            opts.occurrence = n;
            i++;
            continue;
        }
        if ((a === '--include' || a === '-I') && v !== undefined) { opts.include.push(...splitGlobs(v)); i++; continue; }
        if ((a === '--exclude' || a === '-E') && v !== undefined) { opts.exclude.push(...splitGlobs(v)); i++; continue; }
        if (a === '-' || !a.startsWith('-')) { opts.positionals.push(a); continue; }
        fail(`Unknown option "${a}"`);
    }
    return opts;
}

function loadConfig(file: string | undefined): EngineConfig {
    if (!file) return resolveConfig();
    let raw: unknown;
    try {
        raw = JSON.parse(fs.readFileSync(file, 'utf8'));
    } catch (e) {
        fail(`Cannot read config ${file}: ${e instanceof Error ? e.message : String(e)}`);
    }
    return resolveConfig(raw, file);
}

function readInput(arg: string): { content: string; filename: string } {
    if (arg === '-') {
        return { content: fs.readFileSync(0, 'utf8'), filename: '<stdin>' };
    }
    if (!fs.existsSync(arg)) fail(`File not found: ${arg}`);
    return { content: fs.readFileSync(arg, 'utf8'), filename: arg };
}

function isDirectory(p: string) {
    try { return fs.statSync(p).isDirectory(); } catch { return false; }
}

function reportDiagnostics(filename: string, content: string, result: RenderResult) {
    const report = textReport(filename, content, result.diagnostics);
    if (report) console.error(report);
}

function serialize(result: RenderResult, filename: string, format: OutputFormat): string {
    if (format === 'svg') return result.svg;
    if (format === 'json') return JSON.stringify({ ...toJsonResult(filename, result), html: result.html }, null, 2);
    return result.html;
}

function handleRenderCommand(opts: CliOptions) {
    const [type, input, output] = opts.positionals;
    if (!type || !input) {
        printUsage();
        process.exit(1);
    }
    const renderer = new DiagramRenderer(loadConfig(opts.configPath));
    const { content, filename } = readInput(input);
    const result = renderer.render(type, content, { title: opts.title, occurrence: opts.occurrence });
    if (opts.format !== 'json') reportDiagnostics(filename, content, result);
    const text = serialize(result, filename, opts.format);
    if (output) {
        fs.writeFileSync(output, text, 'utf8');
        console.log(`Rendered ${result.type} to ${output}`);
    } else {
        console.log(text);
    }
}

const DEFAULT_IGNORE_DIRS = ['**/.git/**', '**/node_modules/**', '**/dist/**'];

async function listSourceFiles(root: string, includes: string[], excludes: string[]): Promise<string[]> {
    const patterns = includes.length > 0 ? includes : SOURCE_EXTENSIONS.map((ext) => `**/*${ext}`);
    const files = await globby(patterns, {
        cwd: path.resolve(root),
        absolute: true,
        dot: false,
        ignore: [...excludes, ...DEFAULT_IGNORE_DIRS],
        followSymbolicLinks: false,
    });
    return files.sort();
}

async function handleDirectory(root: string, opts: CliOptions) {
    const renderer = new DiagramRenderer(loadConfig(opts.configPath));
    const files = await listSourceFiles(root, opts.include, opts.exclude);
    const ext = opts.format === 'svg' ? '.svg' : opts.format === 'json' ? '.json' : '.html';
    const summaries: ReturnType<typeof toJsonResult>[] = [];
    let rendered = 0;
    let warningCount = 0;

    for (const file of files) {
        const kind = kindFromPath(file);
        if (!kind) continue;
        const content = fs.readFileSync(file, 'utf8');
        const result = renderer.render(kind, content);
        rendered++;
        warningCount += result.diagnostics.filter((d) => d.severity === 'warning').length;

        const rel = path.relative(path.resolve(root), file);
        const target = opts.outDir
            ? path.join(opts.outDir, rel.slice(0, rel.length - path.extname(rel).length) + ext)
            : file.slice(0, file.length - path.extname(file).length) + ext;
        fs.mkdirSync(path.dirname(target), { recursive: true });
        fs.writeFileSync(target, serialize(result, file, opts.format), 'utf8');

        if (opts.format === 'json') summaries.push(toJsonResult(file, result));
        else reportDiagnostics(file, content, result);
    }

    if (opts.format === 'json') {
        console.log(JSON.stringify({ files: summaries, diagramCount: rendered, warningCount }, null, 2));
        return;
    }
    if (rendered === 0) console.log('No diagram sources found.');
    else console.log(`Rendered ${rendered} diagram(s)${warningCount ? ` with ${warningCount} warning(s)` : ''}.`);
}

async function main() {
    const args = process.argv.slice(2);
    if (args.length === 0 || args[0] === '-h' || args[0] === '--help') {
        printUsage();
        process.exit(args.length === 0 ? 1 : 0);
    }

    if (args[0] === 'render') {
        handleRenderCommand(parseArgs(args.slice(1)));
        return;
    }

    const opts = parseArgs(args);
    const target = opts.positionals[0];
    if (!target || !isDirectory(target)) fail(`Not a directory: ${target ?? ''} (use "render" for single files)`);
    await handleDirectory(target, opts);
}

main().catch((error: unknown) => {
    if (isDiagramError(error)) {
        console.error(`Error: ${error.message}`);
    } else {
        console.error(error instanceof Error ? error.stack ?? error.message : String(error));
    }
    process.exit(1);
});
