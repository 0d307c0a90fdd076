import { CodeBuildComputer } from "./computer.js";
import type { AgentNode, CloudContext, JournalEntry, LauncherInterface } from "./types.js";

/** A single-use agent backed by one CodeBuild build. */
export class CodeBuildAgent implements AgentNode {
  readonly kind = "codebuild";
  readonly createdAt: string;

  constructor(
    readonly cloud: CloudContext,
    readonly displayName: string,
    readonly launcher: LauncherInterface
  ) {
    this.createdAt = new Date(cloud.clock.now()).toISOString();
  }

  createComputer(): CodeBuildComputer {
    return new CodeBuildComputer(this);
  }

  toJournalEntry(buildId: string | null): JournalEntry {
    return {
      name: this.displayName,
      cloud: this.cloud.name,
      projectName: this.cloud.config.projectName,
      region: this.cloud.config.region,
      credentialsId: this.cloud.config.credentialsId,
      buildId,
      createdAt: this.createdAt
    };
  }

  toJSON(): Record<string, unknown> {
    return {
      kind: this.kind,
      name: this.displayName,
      cloud: this.cloud.name,
      projectName: this.cloud.config.projectName,
      numExecutors: 1,
      createdAt: this.createdAt
    };
  }
}
