// liftlog init command

import { initState } from '../lib/state.js';

export function runInit(): void {
  const { created, path } = initState();

  if (created) {
    console.log(`✓ Created state file at ${path}`);
  } else {
    console.log(`✓ State file already exists at ${path} (validated)`);
  }
}
