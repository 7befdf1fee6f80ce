/**
 * Registry 진단 보고서
 */

import type { Registry } from '../registry/registry.js';

export interface ReportEntry {
  name: string;
  priority: number;
  status: 'active' | 'disabled';
}

export interface KindReport {
  kind: string;
  entries: ReportEntry[];
}

export interface DisabledReport {
  kind: string;
  name: string;
  priority: number;
  missing: readonly string[];
  hints: readonly string[];
}

export interface RegistryReport {
  kinds: KindReport[];
  disabled: DisabledReport[];
}

function pluginName(implementation: unknown): string {
  if (typeof implementation === 'object' && implementation !== null && 'name' in implementation) {
    const name = implementation.name;
    if (typeof name === 'string') {
      return name;
    }
  }
  return String(implementation);
}

/**
 * kind별 등록 현황과 비활성 플러그인 목록
 * 비활성 플러그인은 해당 kind의 entries에도 status 'disabled'로 포함된다.
 */
export function describeRegistry(registry: Registry): RegistryReport {
  const disabled: DisabledReport[] = registry.disabled().map((entry) => ({
    kind: entry.kind,
    name: entry.name,
    priority: entry.priority,
    missing: entry.marker.missing,
    hints: entry.marker.hints,
  }));

  const kinds: KindReport[] = registry.kinds().map((kind) => ({
    kind,
    entries: registry.entries(kind).map((entry) => ({
      name: pluginName(entry.implementation),
      priority: entry.priority,
      status: 'active' as const,
    })),
  }));

  for (const entry of disabled) {
    let report = kinds.find((item) => item.kind === entry.kind);
    if (!report) {
      report = { kind: entry.kind, entries: [] };
      kinds.push(report);
    }
    report.entries.push({ name: entry.name, priority: entry.priority, status: 'disabled' });
  }

  return { kinds, disabled };
}

/**
 * 보고서를 텍스트로 출력
 *
 * @example
 * ```
 * loader
 *   [100] pdf (disabled)
 *   [1] plain-text
 *
 * Disabled plugins:
 *   pdf (loader): missing unpdf. Try: npm install unpdf
 * ```
 */
export function formatRegistryReport(report: RegistryReport): string {
  const sections = report.kinds.map((kind) => {
    const lines = [kind.kind];
    const ordered = [...kind.entries].sort((a, b) => b.priority - a.priority);
    for (const entry of ordered) {
      const suffix = entry.status === 'disabled' ? ' (disabled)' : '';
      lines.push(`  [${entry.priority}] ${entry.name}${suffix}`);
    }
    return lines.join('\n');
  });

  if (report.disabled.length > 0) {
    const lines = ['Disabled plugins:'];
    for (const entry of report.disabled) {
      const hint = entry.hints.length > 0 ? `. Try: ${entry.hints.join('; ')}` : '';
      lines.push(`  ${entry.name} (${entry.kind}): missing ${entry.missing.join(', ')}${hint}`);
    }
    sections.push(lines.join('\n'));
  }

  return sections.join('\n\n');
}
