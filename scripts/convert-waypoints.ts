import fs from 'node:fs';
import path from 'node:path';
import { describeError } from '../lib/cup/errors';
import { lookupElevation } from '../lib/geo-lookup';
import {
  fillMissingElevations,
  formatFromFilename,
  parseWaypointFile,
  serializeWaypoints
} from '../lib/waypoint-editor';

const USAGE = 'Usage: convert-waypoints <input.cup|csv> <output.cup|csv> [--fill-elevation] [--legacy-layout]';

interface ConvertArgs {
  input: string;
  output: string;
  fillElevation: boolean;
  legacyLayout: boolean;
}

function parseArgs(argv: string[]): ConvertArgs | null {
  const flags = new Set(argv.filter((arg) => arg.startsWith('--')));
  const positional = argv.filter((arg) => !arg.startsWith('--'));
  const unknown = [...flags].filter((flag) => flag !== '--fill-elevation' && flag !== '--legacy-layout');
  if (positional.length !== 2 || unknown.length > 0) return null;
  return {
    input: positional[0],
    output: positional[1],
    fillElevation: flags.has('--fill-elevation'),
    legacyLayout: flags.has('--legacy-layout')
  };
}

async function main() {
  const args = parseArgs(process.argv.slice(2));
  if (!args) {
    console.error(USAGE);
    process.exitCode = 2;
    return;
  }

  const inputFormat = formatFromFilename(args.input);
  const outputFormat = formatFromFilename(args.output);
  if (!inputFormat || !outputFormat) {
    console.error('Input and output must end in .cup or .csv');
    process.exitCode = 2;
    return;
  }

  const content = fs.readFileSync(args.input, 'utf8');
  const { waypoints, warnings } = parseWaypointFile(inputFormat, content);
  for (const warning of warnings) {
    console.warn(`[convert] ${path.basename(args.input)}:${warning.line}: ${warning.message}`);
  }
  console.log(`Read ${waypoints.length} waypoints from ${args.input}`);

  if (args.fillElevation) {
    const filled = await fillMissingElevations(waypoints, lookupElevation);
    console.log(`Filled ${filled} missing elevations`);
  }

  fs.mkdirSync(path.dirname(path.resolve(args.output)), { recursive: true });
  fs.writeFileSync(
    args.output,
    serializeWaypoints(outputFormat, waypoints, { includeRunwayWidth: !args.legacyLayout })
  );
  console.log(`✅ Wrote ${waypoints.length} waypoints to ${args.output}`);
}

main().catch((error: unknown) => {
  console.error(`[convert] ${describeError(error)}`);
  process.exitCode = 1;
});
