import {
  CodeBuildClient,
  paginateListProjects,
  SourceType,
  StartBuildCommand,
  StopBuildCommand,
  type ComputeType
} from "@aws-sdk/client-codebuild";

export interface StartBuildRequest {
  projectName: string;
  buildspec: string;
  image: string;
  computeType: ComputeType;
}

/** The slice of CodeBuild the provisioner talks to. */
export interface BuildService {
  startBuild(request: StartBuildRequest): Promise<string>;
  stopBuild(buildId: string): Promise<void>;
  listProjects(): Promise<string[]>;
}

export class CodeBuildService implements BuildService {
  constructor(private readonly client: CodeBuildClient) {}

  async startBuild(request: StartBuildRequest): Promise<string> {
    const result = await this.client.send(
      new StartBuildCommand({
        projectName: request.projectName,
        sourceTypeOverride: SourceType.NO_SOURCE,
        buildspecOverride: request.buildspec,
        imageOverride: request.image,
        privilegedModeOverride: true,
        computeTypeOverride: request.computeType
      })
    );

    const buildId = result.build?.id;
    if (!buildId) {
      throw new Error(`CodeBuild returned no build ID for project ${request.projectName}`);
    }
    return buildId;
  }

  async stopBuild(buildId: string): Promise<void> {
    await this.client.send(new StopBuildCommand({ id: buildId }));
  }

  async listProjects(): Promise<string[]> {
    const projects: string[] = [];
    for await (const page of paginateListProjects({ client: this.client }, {})) {
      projects.push(...(page.projects ?? []));
    }
    return projects.sort();
  }
}
