#!/usr/bin/env node
import * as fs from 'fs';
import * as process from 'process';

import * as S from './schema';
import { debugPrint, nodeStats } from './debug_print';
import { parseProgram } from './parse_js';

interface LoadOptions {
    filename: string;
}

function load(options: LoadOptions): S.Program {
    const source: string = fs.readFileSync(options.filename, 'utf8');
    return parseProgram(source, options.filename);
}

function dumpAst(filename: string) {
    const program = load({ filename });
    console.log(debugPrint(program));
}

function stats(filename: string) {
    const program = load({ filename });
    for (const [type, count] of nodeStats(program)) {
        console.log(`${type} ${count}`);
    }
}

function main() {
    const args: Array<string> = process.argv.slice(2);
    if (args.length < 2) {
        console.error("Filename not given.");
        process.exit(1);
    }
    try {
        if (args[0] === '--dump-ast') {
            dumpAst(args[1]);
        } else if (args[0] === '--stats') {
            stats(args[1]);
        } else {
            console.error(`Unrecognized command: ${args[0]}`);
            process.exit(1);
        }
    } catch (e) {
        console.error(e instanceof Error ? e.message : String(e));
        process.exit(1);
    }
}

if (require.main === module) {
    main();
}
