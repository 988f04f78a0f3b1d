import { injectable } from "inversify";

import { ObjectiveKind } from "@/shared/constants/ObjectiveEnums";
import { ObjectiveErrorCode } from "@/shared/constants/ErrorEnums";
import { logger, LogCategory } from "@/infrastructure/utils/logger";
import type { Objective, ObjectiveSeed } from "./core/Objective";
import { ObjectiveManagerError } from "./core/ObjectiveManagerError";
import { ImmediateObjective } from "./layered/ImmediateObjective";
import { ShortTermObjective } from "./layered/ShortTermObjective";
import { MidTermObjective } from "./layered/MidTermObjective";
import { LongTermObjective } from "./layered/LongTermObjective";
import { MetaObjective } from "./layered/MetaObjective";
import { SanityDependentObjective } from "./sanity/SanityDependentObjective";
import { CosmicInsightObjective } from "./sanity/CosmicInsightObjective";
import { MadnessObjective } from "./sanity/MadnessObjective";
import { DEFAULT_TEMPLATES, type ObjectiveTemplate } from "./templates";
import {
  objectiveOptionsSchema,
  type ObjectiveDict,
  type ObjectiveOptions,
} from "./schemas";

export type ObjectiveFactory = (objectiveId: string, seed: ObjectiveSeed) => Objective;

/**
 * Maps kind names to constructors and holds named templates.
 *
 * The same table rebuilds persisted objectives: a dict's `kind` picks the
 * factory, its `options` rebuild the definition, and the lifecycle fields are
 * restored on top.
 */
@injectable()
export class ObjectiveRegistry {
  private factories = new Map<string, ObjectiveFactory>();
  private templates = new Map<string, ObjectiveTemplate>();

  constructor() {
    this.registerKind(ObjectiveKind.IMMEDIATE, (id, seed) => new ImmediateObjective(id, seed));
    this.registerKind(ObjectiveKind.SHORT_TERM, (id, seed) => new ShortTermObjective(id, seed));
    this.registerKind(ObjectiveKind.MID_TERM, (id, seed) => new MidTermObjective(id, seed));
    this.registerKind(ObjectiveKind.LONG_TERM, (id, seed) => new LongTermObjective(id, seed));
    this.registerKind(ObjectiveKind.META, (id, seed) => new MetaObjective(id, seed));
    this.registerKind(
      ObjectiveKind.SANITY_DEPENDENT,
      (id, seed) => new SanityDependentObjective(id, seed),
    );
    this.registerKind(
      ObjectiveKind.COSMIC_INSIGHT,
      (id, seed) => new CosmicInsightObjective(id, seed),
    );
    this.registerKind(ObjectiveKind.MADNESS, (id, seed) => new MadnessObjective(id, seed));

    for (const [name, template] of Object.entries(DEFAULT_TEMPLATES)) {
      this.registerTemplate(name, template);
    }
  }

  registerKind(kind: string, factory: ObjectiveFactory): void {
    this.factories.set(kind, factory);
    logger.debug(`Registered objective kind: ${kind}`, LogCategory.OBJECTIVES);
  }

  registerTemplate(name: string, template: ObjectiveTemplate): void {
    this.templates.set(name, { kind: template.kind, options: structuredClone(template.options) });
    logger.debug(`Registered objective template: ${name}`, LogCategory.OBJECTIVES);
  }

  hasKind(kind: string): boolean {
    return this.factories.has(kind);
  }

  hasTemplate(name: string): boolean {
    return this.templates.has(name);
  }

  getAvailableKinds(): string[] {
    return [...this.factories.keys()];
  }

  getAvailableTemplates(): string[] {
    return [...this.templates.keys()];
  }

  getTemplate(name: string): ObjectiveTemplate | undefined {
    const template = this.templates.get(name);
    return template && { kind: template.kind, options: structuredClone(template.options) };
  }

  create(kind: string, objectiveId: string, seed: ObjectiveSeed = {}): Objective {
    const factory = this.factories.get(kind);
    if (!factory) {
      throw new ObjectiveManagerError(
        ObjectiveErrorCode.UNKNOWN_TYPE,
        `Unknown objective type: ${kind}`,
      );
    }
    return factory(objectiveId, seed);
  }

  createFromTemplate(
    name: string,
    objectiveId: string,
    overrides: ObjectiveOptions = {},
  ): Objective {
    const template = this.templates.get(name);
    if (!template) {
      throw new ObjectiveManagerError(
        ObjectiveErrorCode.UNKNOWN_TEMPLATE,
        `Unknown objective template: ${name}`,
      );
    }
    const parsed = objectiveOptionsSchema.safeParse(overrides);
    if (!parsed.success) {
      throw new ObjectiveManagerError(
        ObjectiveErrorCode.INVALID_OPTIONS,
        `Invalid overrides for template ${name}: ${parsed.error.message}`,
      );
    }
    return this.create(template.kind, objectiveId, {
      ...structuredClone(template.options),
      ...overrides,
    });
  }

  /**
   * Rebuilds an objective from its persisted dict.
   */
  hydrate(dict: ObjectiveDict): Objective {
    const objective = this.create(dict.kind, dict.objective_id, dict.options);
    objective.restoreFromDict(dict);
    return objective;
  }
}
