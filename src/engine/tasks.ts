import { CATEGORIES, type CleanupTask, type TaskDescriptor } from '../types.js';
import type { LocationResolver } from '../utils/paths.js';
import { isTaskEnabled, parseTaskDescriptors, taskName } from '../utils/config.js';

/**
 * Turns configured descriptors into frozen tasks bound to a resolver.
 * Validation errors surface here as ConfigError, before any run can start.
 */
export function createTasks(descriptors: readonly TaskDescriptor[], resolver: LocationResolver): readonly CleanupTask[] {
  const validated = parseTaskDescriptors(descriptors);

  return Object.freeze(
    validated.map((descriptor): CleanupTask => {
      const category = CATEGORIES[descriptor.category];
      const policy = Object.freeze({
        ...category.policy,
        recursive: descriptor.recursive ?? category.policy.recursive,
      });
      return Object.freeze({
        name: taskName(descriptor),
        category,
        enabled: isTaskEnabled(descriptor),
        policy,
        roots: () => resolver.resolve(category.id),
      });
    })
  );
}
