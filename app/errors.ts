import { NotifyError } from "@labframe/notify-core";

export class ConfigError extends NotifyError {
  constructor(readonly problems: string[]) {
    super(`invalid configuration: ${problems.join("; ")}`);
  }
}

export class InvalidProjectNameError extends NotifyError {
  constructor(readonly project: string) {
    super(`invalid project name "${project}"`);
  }
}

export class ProjectNotFoundError extends NotifyError {
  constructor(readonly project: string) {
    super(`Project '${project}' not found`);
  }
}
