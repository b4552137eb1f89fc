// ──────────────────────────────────────────
// Shared: Data-quality issue log for a harmonization run
// ──────────────────────────────────────────

import { Issue } from './types';

export class IssueLog {
  private issues: Issue[] = [];

  warn(component: string, message: string): void {
    this.issues.push({ component, message });
    console.warn(`[${component}] ${message}`);
  }

  list(): Issue[] {
    return [...this.issues];
  }

  get size(): number {
    return this.issues.length;
  }
}
