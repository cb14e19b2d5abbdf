// liftlog add command - append a raw log row by hand

import { loadSheetConfig } from '../lib/config.js';
import { SheetClient } from '../lib/sheet.js';
import { SheetWriter } from '../lib/writer.js';

interface AddOptions {
  user?: string;
}

export async function runAdd(text: string, options: AddOptions): Promise<void> {
  if (!text || !text.trim()) {
    console.error('Error: Log text cannot be empty');
    process.exit(1);
  }

  const writer = new SheetWriter(new SheetClient(loadSheetConfig()));
  const timestamp = new Date().toISOString();

  await writer.appendRawLog({
    timestamp,
    user_id: options.user || 'cli',
    raw_text: text.trim()
  }, 'cli_text');

  console.log(`✓ Logged at ${timestamp}`);
}
