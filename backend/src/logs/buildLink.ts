import type { CodeBuildComputer } from "../nodes/computer.js";

export const BUILD_LINK_PREFIX = "[CodeBuild]: Started remote build: ";

/** Console of the job a task runs in. */
export interface LogSink {
  print(text: string): void;
  hyperlink(url: string, text: string): void;
  println(text?: string): void;
}

export interface BuildLink {
  agent: string;
  buildId: string;
  url: string;
}

export function describeBuildLink(computer: CodeBuildComputer): BuildLink | null {
  const buildId = computer.getBuildId();
  const url = computer.getBuildUrl();
  if (!buildId || !url) return null;
  return { agent: computer.name, buildId, url };
}

/** Writes the link to the agent's build into a job log. Returns false when no build is bound. */
export function announceBuild(computer: CodeBuildComputer, sink: LogSink): boolean {
  const link = describeBuildLink(computer);
  if (!link) return false;
  sink.print(BUILD_LINK_PREFIX);
  sink.hyperlink(link.url, link.buildId);
  sink.println();
  return true;
}

/** Collects sink output as plain text lines, hyperlinks rendered as `text <url>`. */
export class TextLogSink implements LogSink {
  private readonly lines: string[] = [];
  private current = "";

  print(text: string): void {
    this.current += text;
  }

  hyperlink(url: string, text: string): void {
    this.current += `${text} <${url}>`;
  }

  println(text = ""): void {
    this.lines.push(this.current + text);
    this.current = "";
  }

  toLines(): string[] {
    return this.current ? [...this.lines, this.current] : [...this.lines];
  }
}
