#!/usr/bin/env node
/**
 * resolve.ts - Assigns ids and resolves cross-references across a directory of chapters
 *
 * Reads .xhtml, .html and .md chapters in name order, runs one resolution pass and
 * writes the rewritten chapters, the generated index/notes pages and report.json.
 *
 * Usage: tsx scripts/resolve.ts <inputDir> <outputDir> [--config=engine.json] [--preset=scholarly]
 * Exit code is 1 on usage or configuration errors; broken references are only reported.
 */

import * as fs from 'node:fs';
import { loadChunks, writeResult } from '../src/loader.js';
import { EngineConfig, loadConfig, PresetName } from '../src/config.js';
import { resolveDocument } from '../src/engine.js';
import { ConfigError } from '../src/errors.js';

const USAGE = 'Usage: tsx scripts/resolve.ts <inputDir> <outputDir> [--config=file] [--preset=default|scholarly]';

function isPresetName(value: string): value is PresetName {
    return value === 'default' || value === 'scholarly';
}

async function main(): Promise<number> {
    const args = process.argv.slice(2);
    const positional = args.filter(a => !a.startsWith('--'));
    const option = (name: string): string | undefined =>
        args.find(a => a.startsWith(`--${name}=`))?.slice(name.length + 3);

    if (positional.length !== 2) {
        console.error(USAGE);
        return 1;
    }

    const [inputDir, outputDir] = positional;

    if (!fs.existsSync(inputDir) || !fs.statSync(inputDir).isDirectory()) {
        console.error(`Input directory not found: ${inputDir}`);
        return 1;
    }

    const preset = option('preset');
    if (preset !== undefined && !isPresetName(preset)) {
        console.error(`Unknown preset: ${preset}`);
        return 1;
    }

    let config: EngineConfig;
    try {
        config = await loadConfig(option('config'), preset ? { preset } : {});
    } catch (err) {
        if (err instanceof ConfigError) {
            console.error(`Configuration error: ${err.message}`);
            return 1;
        }
        throw err;
    }

    const load = loadChunks({ contentDir: inputDir, stylesheet: config.stylesheet });
    for (const error of load.errors) {
        console.warn(error);
    }
    if (load.chunks.length === 0) {
        console.error(`No chapter files in ${inputDir}`);
        return 1;
    }

    const result = resolveDocument(load.chunks, config);
    const written = await writeResult(result, outputDir);
    console.log(`Wrote ${written.length} files to ${outputDir}`);

    // Report summary
    const { stats, status, errors } = result.report;
    const targets = Object.entries(stats.targetsByKind)
        .filter(([, count]) => count > 0)
        .map(([kind, count]) => `${count} ${kind}`)
        .join(', ');
    console.log(`Targets: ${targets || 'none'}`);
    console.log(`References: ${stats.referencesResolved} resolved, ${stats.referencesBroken} broken`);
    console.log(`Index: ${stats.indexEntries} entries, ${stats.crossReferencesUnresolved} unresolved cross-references`);
    console.log(`Notes: ${stats.noteCallsFound} calls, ${stats.noteCallsBroken} broken, ${stats.backRefsGenerated} back-references`);
    console.log(`Collisions resolved: ${stats.collisionsResolved}`);
    for (const error of errors) {
        console.error(`${error.kind}: ${error.message}`);
    }
    console.log(`Status: ${status}`);

    return 0;
}

main().then(code => {
    process.exitCode = code;
}).catch(err => {
    console.error(err instanceof Error ? err.message : err);
    process.exitCode = 1;
});
