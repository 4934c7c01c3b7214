#!/usr/bin/env -S npx tsx
import { main } from './main';

main(process.argv.slice(2)).then(exitCode => {
  process.exitCode = exitCode;
});
