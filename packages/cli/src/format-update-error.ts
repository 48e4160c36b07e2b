import { SettingsError } from './settings.js';
import { UpdateError } from './update-error.js';

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function formatUpdateError(error: unknown): string {
  if (error instanceof UpdateError) {
    switch (error.phase) {
      case 'crawl': return `Crawl failed: ${messageOf(error.cause)}`;
      case 'import': return `Import failed: ${messageOf(error.cause)}`;
      case 'write': return `Write failed: ${messageOf(error.cause)}`;
    }
  }
  if (error instanceof SettingsError) {
    return `Invalid settings: ${error.message}`;
  }
  return `Update failed: ${messageOf(error)}`;
}
