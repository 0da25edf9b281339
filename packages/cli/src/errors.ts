import { AutolayerError } from "@autolayer/core";

export class CliArgumentError extends AutolayerError {
  constructor(message: string) {
    super(message);
    this.name = "CliArgumentError";
  }
}

export type BuildResultIssue = {
  path: string;
  message: string;
};

export class InvalidBuildResultError extends AutolayerError {
  constructor(
    message: string,
    public readonly issues: BuildResultIssue[] = [],
  ) {
    super(message);
    this.name = "InvalidBuildResultError";
  }
}
