import jwt, { type Algorithm } from "jsonwebtoken";

const CONNECT_SCOPE = "agent-connect";
const ALGORITHMS: Algorithm[] = ["HS256"];

/**
 * Per-agent connect secrets. The secret handed to a build is an HS256 token
 * whose subject is the agent display name, so it only authenticates that agent.
 */
export class ConnectSecrets {
  constructor(private readonly secret: string) {}

  issue(agentName: string): string {
    return jwt.sign({ scope: CONNECT_SCOPE }, this.secret, { algorithm: "HS256", subject: agentName });
  }

  verify(agentName: string, token: string): boolean {
    try {
      const decoded = jwt.verify(token, this.secret, { algorithms: ALGORITHMS, subject: agentName });
      return typeof decoded === "object" && decoded.scope === CONNECT_SCOPE;
    } catch {
      return false;
    }
  }
}
