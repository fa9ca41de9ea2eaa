import { DescriptorValidationError, InheritanceError } from "../errors.js";
import {
  finalizeDescriptor,
  type DescriptorFields,
  type ParsedDescriptorFile,
  type PluginDescriptor
} from "./descriptor.js";

/**
 * One discovered file in emission order (lowest priority first).
 * Plain entries arrive already finalized; inheriting entries carry no descriptor yet.
 */
export type InheritanceEntry = {
  file: ParsedDescriptorFile;
  descriptor?: PluginDescriptor;
};

type Resolved = {
  fields: DescriptorFields;
  descriptor: PluginDescriptor;
};

export type InheritanceFailure = InheritanceError | DescriptorValidationError;

export function mergeDescriptorFields(
  parent: DescriptorFields,
  child: DescriptorFields,
  name: string
): DescriptorFields {
  return {
    name,
    command: child.command ?? parent.command,
    requires: child.requires ?? parent.requires,
    inherits_from: child.inherits_from,
    short_help: child.short_help ?? parent.short_help,
    run_detached: child.run_detached ?? parent.run_detached,
    rez_opts: { ...(parent.rez_opts ?? {}), ...(child.rez_opts ?? {}) }
  };
}

/**
 * Resolves every inheriting entry against the entries visible to it.
 * Returns the merged descriptor of each child that could be resolved; the
 * others are reported through `onFailure` and left out.
 */
export function resolveInheritance(
  entries: readonly InheritanceEntry[],
  onFailure: (failure: InheritanceFailure) => void
): Map<InheritanceEntry, PluginDescriptor> {
  const positions = new Map<InheritanceEntry, number>();
  const byName = new Map<string, InheritanceEntry[]>();
  entries.forEach((entry, index) => {
    positions.set(entry, index);
    const list = byName.get(entry.file.name) ?? [];
    list.push(entry);
    byName.set(entry.file.name, list);
  });

  const resolved = new Map<InheritanceEntry, Resolved>();
  const failed = new Set<InheritanceEntry>();

  const fail = (entry: InheritanceEntry, failure: InheritanceFailure): void => {
    failed.add(entry);
    onFailure(failure);
  };

  // Entries named `parentName` from highest to lowest priority, never the child
  // itself. A child extending its own name only sees lower-priority entries.
  const parentCandidates = (
    parentName: string,
    child: InheritanceEntry
  ): InheritanceEntry[] => {
    const childPosition = positions.get(child) ?? -1;
    return (byName.get(parentName) ?? [])
      .filter((candidate) => candidate !== child)
      .filter(
        (candidate) =>
          parentName !== child.file.name ||
          (positions.get(candidate) ?? -1) < childPosition
      )
      .reverse();
  };

  const resolveEntry = (
    entry: InheritanceEntry,
    chain: InheritanceEntry[]
  ): Resolved | null => {
    if (entry.descriptor) {
      return { fields: entry.file.fields, descriptor: entry.descriptor };
    }
    const cached = resolved.get(entry);
    if (cached) {
      return cached;
    }
    if (failed.has(entry)) {
      return null;
    }

    const cycleStart = chain.indexOf(entry);
    if (cycleStart !== -1) {
      const cycle = chain.slice(cycleStart);
      const path = [...cycle, entry]
        .map((member) => member.file.name)
        .join(" -> ");
      for (const member of cycle) {
        fail(
          member,
          new InheritanceError(member.file.filePath, `inheritance cycle ${path}`)
        );
      }
      return null;
    }

    const parentName = entry.file.fields.inherits_from ?? "";
    const candidates = parentCandidates(parentName, entry);
    if (candidates.length === 0) {
      fail(
        entry,
        new InheritanceError(
          entry.file.filePath,
          `parent plugin '${parentName}' was not found`
        )
      );
      return null;
    }

    // Failed candidates are skipped; the next one down is the visible parent.
    let parentResolved: Resolved | null = null;
    for (const candidate of candidates) {
      parentResolved = resolveEntry(candidate, [...chain, entry]);
      if (parentResolved || failed.has(entry)) {
        break;
      }
    }
    if (!parentResolved) {
      if (!failed.has(entry)) {
        fail(
          entry,
          new InheritanceError(
            entry.file.filePath,
            `parent plugin '${parentName}' could not be resolved`
          )
        );
      }
      return null;
    }

    const fields = mergeDescriptorFields(
      parentResolved.fields,
      entry.file.fields,
      entry.file.name
    );
    try {
      const descriptor = finalizeDescriptor({ ...entry.file, fields });
      const result = { fields, descriptor };
      resolved.set(entry, result);
      return result;
    } catch (error) {
      if (error instanceof DescriptorValidationError) {
        fail(entry, error);
        return null;
      }
      throw error;
    }
  };

  const result = new Map<InheritanceEntry, PluginDescriptor>();
  for (const entry of entries) {
    if (entry.descriptor) {
      continue;
    }
    const outcome = resolveEntry(entry, []);
    if (outcome) {
      result.set(entry, outcome.descriptor);
    }
  }
  return result;
}
