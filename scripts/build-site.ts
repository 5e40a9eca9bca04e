#!/usr/bin/env node
/**
 * build-site.ts - Builds the linked-data site into the configured output directory
 *
 * Usage: tsx scripts/build-site.ts [lodbook.config.json]
 * The config path may also be given with LODBOOK_CONFIG.
 */

import { Advisories } from '../src/advisories.js';
import { JsonLdCodec } from '../src/codec.js';
import { loadConfig, resolvePath } from '../src/config.js';
import { loadSite } from '../src/loader.js';
import { buildSite } from '../src/site-builder.js';
import { encodeSite, writeSite } from '../src/site-writer.js';

async function main() {
    const args = process.argv.slice(2);

    if (args.length > 1) {
        console.error('Usage: tsx scripts/build-site.ts [config.json]');
        process.exit(1);
    }

    const config = await loadConfig(args[0]);
    const codec = new JsonLdCodec();
    const advisories = new Advisories();

    const { context, documents, errors } = await loadSite(config, codec, advisories);
    for (const error of errors) {
        console.error(error);
    }
    console.log(`Loaded ${documents.length} documents, ${context.records.size} records`);

    const build = buildSite(documents, context);
    const files = await encodeSite(build, context, { codec, collections: config.collections });
    await writeSite(files, resolvePath(config, config.outputDir));

    console.log(`Built ${build.documents.length} documents, ${build.entities.length} entity pages`);
    if (advisories.size > 0) {
        console.log(`${advisories.size} advisories`);
    }
}

main().catch((err: unknown) => {
    console.error(err instanceof Error ? `${err.name}: ${err.message}` : err);
    process.exit(1);
});
