import type { TypeDeclaration } from "../model/declaration";
import type { Diagnostic } from "../outcome/diagnostic";
import { withSeverity } from "../outcome/diagnostic";
import { DEFAULT_MAX_VALUE_CHAIN_DEPTH } from "./analysis/ownershipGraph";
import { createPassContext } from "./context";
import { duplicateDeclarationPass } from "./passes/duplicateDeclaration";
import { retainCyclePass } from "./passes/retainCycle";
import { storedMembersPass } from "./passes/storedMembers";
import { unknownOwnedTypePass } from "./passes/unknownOwnedType";
import type {
  AnalysisOptions,
  LintConfig,
  LogFn,
  Pass,
  PassConfig,
  PassContext,
  PassPhase,
  PassResult,
  SeverityOverride,
} from "./types";

const DEFAULT_CONFIG: LintConfig = { passes: {} };
const PHASE_ORDER: PassPhase[] = ["index", "graph", "lint"];

export interface RunnerOptions {
  analysis?: Partial<AnalysisOptions>;
  log?: LogFn;
}

export interface RunResult {
  /** The declaration set after every transforming pass. */
  declarations: readonly TypeDeclaration[];
  diagnostics: Diagnostic[];
  passResults: Map<string, PassResult>;
}

const noop: LogFn = () => {};

export class LintRunner {
  private passes: Map<string, Pass> = new Map();
  private config: LintConfig;
  private analysisOptions: AnalysisOptions;
  private log: LogFn;

  constructor(config: Partial<LintConfig> = DEFAULT_CONFIG, options: RunnerOptions = {}) {
    this.config = { passes: config?.passes ?? {} };
    this.analysisOptions = {
      maxValueChainDepth: options.analysis?.maxValueChainDepth ?? DEFAULT_MAX_VALUE_CHAIN_DEPTH,
    };
    this.log = options.log ?? noop;
  }

  register(pass: Pass): void {
    if (this.passes.has(pass.id)) {
      throw new Error(`Pass already registered: ${pass.id}`);
    }
    this.passes.set(pass.id, pass);
  }

  getPasses(): Pass[] {
    return Array.from(this.passes.values());
  }

  run(declarations: readonly TypeDeclaration[]): RunResult {
    let ctx: PassContext = createPassContext(declarations, this.analysisOptions);
    const diagnostics: Diagnostic[] = [];
    const passResults = new Map<string, PassResult>();
    const sorted = this.resolvePassOrder();

    for (const pass of sorted) {
      const config = this.getPassConfig(pass.id);
      const result = pass.run(ctx);
      passResults.set(pass.id, result);

      diagnostics.push(...applySeverityOverride(result.diagnostics, config.severityOverride));
      this.log(`pass ${pass.id}`, {
        diagnostics: result.diagnostics.length,
        transformed: result.transformed !== undefined,
      });

      if (result.transformed) {
        ctx = createPassContext(result.transformed, this.analysisOptions);
      }
    }

    return { declarations: ctx.declarations, diagnostics, passResults };
  }

  private resolvePassOrder(): Pass[] {
    const enabledPasses = Array.from(this.passes.values()).filter(p => this.isPassEnabled(p.id));
    const passLookup = new Map(enabledPasses.map(p => [p.id, p]));
    const ordered: Pass[] = [];
    const executed = new Set<string>();

    for (const pass of enabledPasses) {
      for (const dep of this.enabledDependencies(pass)) {
        if (!passLookup.has(dep)) {
          throw new Error(`Pass dependency not registered: ${dep}`);
        }
      }
    }

    for (const phase of PHASE_ORDER) {
      const phasePasses = enabledPasses.filter(p => p.phase === phase);
      if (phasePasses.length === 0) continue;

      const indegree = new Map<string, number>();
      const edges = new Map<string, Set<string>>();

      for (const pass of phasePasses) {
        indegree.set(pass.id, 0);
        edges.set(pass.id, new Set());
      }

      for (const pass of phasePasses) {
        for (const dep of this.enabledDependencies(pass)) {
          const depPass = passLookup.get(dep);
          if (!depPass) {
            continue;
          }

          const depPhaseIndex = this.phaseIndex(depPass.phase);
          const passPhaseIndex = this.phaseIndex(pass.phase);

          if (depPhaseIndex > passPhaseIndex) {
            throw new Error(`Pass ${pass.id} depends on ${dep} in later phase ${depPass.phase}`);
          }

          if (depPhaseIndex < passPhaseIndex) {
            if (!executed.has(dep)) {
              throw new Error(`Pass dependency has not run: ${dep} (required by ${pass.id})`);
            }
            continue;
          }

          edges.get(dep)?.add(pass.id);
          indegree.set(pass.id, (indegree.get(pass.id) ?? 0) + 1);
        }
      }

      const ready = phasePasses
        .filter(p => (indegree.get(p.id) ?? 0) === 0)
        .sort(byId);

      let processed = 0;
      for (let next = ready.shift(); next !== undefined; next = ready.shift()) {
        ordered.push(next);
        executed.add(next.id);
        processed++;

        for (const target of edges.get(next.id) ?? []) {
          const updated = (indegree.get(target) ?? 0) - 1;
          indegree.set(target, updated);
          const targetPass = passLookup.get(target);
          if (updated === 0 && targetPass) {
            ready.push(targetPass);
            ready.sort(byId);
          }
        }
      }

      if (processed !== phasePasses.length) {
        throw new Error(`Pass dependency cycle detected in phase ${phase}`);
      }
    }

    return ordered;
  }

  private getPassConfig(passId: string): PassConfig {
    return this.config.passes[passId] ?? { enabled: true };
  }

  private isPassEnabled(passId: string): boolean {
    const config = this.getPassConfig(passId);
    return config.enabled !== false && config.severityOverride !== "off";
  }

  private enabledDependencies(pass: Pass): string[] {
    return (pass.dependencies ?? []).filter(dep => this.isPassEnabled(dep));
  }

  private phaseIndex(phase: PassPhase): number {
    const idx = PHASE_ORDER.indexOf(phase);
    if (idx === -1) {
      throw new Error(`Unknown pass phase: ${phase}`);
    }
    return idx;
  }
}

function byId(a: Pass, b: Pass): number {
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

function applySeverityOverride(diagnostics: Diagnostic[], override?: SeverityOverride): Diagnostic[] {
  if (!override || override === "off") {
    return diagnostics;
  }
  return withSeverity(diagnostics, override);
}

export const DEFAULT_PASSES: readonly Pass[] = [
  duplicateDeclarationPass,
  unknownOwnedTypePass,
  retainCyclePass,
  storedMembersPass,
];

export function createDefaultRunner(config?: Partial<LintConfig>, options: RunnerOptions = {}): LintRunner {
  const runner = new LintRunner(config ?? DEFAULT_CONFIG, options);
  for (const pass of DEFAULT_PASSES) {
    runner.register(pass);
  }
  return runner;
}
