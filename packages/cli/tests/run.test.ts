import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { parseTemplate } from "@autolayer/core";
import type { Logger } from "@autolayer/types";
import { runGenerate } from "../src/run";
import type { CliConfig } from "../src/args";

const TEMPLATE = `AWSTemplateFormatVersion: "2010-09-09"
Transform: AWS::Serverless-2016-10-31
Resources:
  Fn1:
    Type: AWS::Serverless::Function
    Properties:
      CodeUri: src/
      Handler: app.handler
      Runtime: python3.11
  Bucket:
    Type: AWS::S3::Bucket
    Properties:
      BucketName: !Sub "\${AWS::StackName}-data"
`;

const BUILD_RESULT = JSON.stringify({
  artifacts: { Fn1: "Fn1" },
  buildGraph: {
    functionBuildDefinitions: [
      { functions: ["Fn1"], runtime: "python3.11", dependenciesDir: "deps/Fn1" },
    ],
  },
});

const LAYER_REF = {
  "Fn::GetAtt": ["AwsSamAutoDependencyLayerNestedStack", "Outputs.Fn1362b6916DepLayer"],
};

function createFakeLogger() {
  const logger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: (): Logger => logger,
    withContext: (): Logger => logger,
  };
  return logger;
}

describe("runGenerate", () => {
  let root: string;
  let config: CliConfig;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), "autolayer-run-"));
    const buildDir = join(root, ".build");
    mkdirSync(join(buildDir, "deps", "Fn1", "requests"), { recursive: true });
    writeFileSync(join(buildDir, "deps", "Fn1", "requests", "__init__.py"), "");
    writeFileSync(join(root, "template.yaml"), TEMPLATE);
    writeFileSync(join(buildDir, "build-result.json"), BUILD_RESULT);

    config = {
      template: join(root, "template.yaml"),
      buildDir,
      buildResult: join(buildDir, "build-result.json"),
      stackName: "MyStack",
    };
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it("writes the patched template through the writer when no output is set", () => {
    const write = vi.fn<(text: string) => void>();

    runGenerate(config, createFakeLogger(), write);

    expect(write).toHaveBeenCalledTimes(1);
    const written = parseTemplate(write.mock.calls[0]![0]);
    expect(written.Resources?.Fn1?.Properties?.Layers).toEqual([LAYER_REF]);
    expect(written.Resources?.Bucket?.Properties?.BucketName).toEqual({
      "Fn::Sub": "${AWS::StackName}-data",
    });
    expect(written.Resources?.AwsSamAutoDependencyLayerNestedStack).toEqual({
      Type: "AWS::CloudFormation::Stack",
      DeletionPolicy: "Delete",
      Properties: { TemplateURL: join(config.buildDir, "nested_template.yaml") },
      Metadata: { CreatedBy: "autolayer" },
    });
  });

  it("builds the layer folder and the nested template in the build directory", () => {
    runGenerate(config, createFakeLogger(), () => {});

    const layerRoot = join(config.buildDir, "Fn1362b6916DepLayer");
    expect(
      existsSync(join(layerRoot, "python", "lib", "python3.11", "site-packages", "requests", "__init__.py")),
    ).toBe(true);

    const nested = parseTemplate(readFileSync(join(config.buildDir, "nested_template.yaml"), "utf8"));
    expect(nested.Resources?.Fn1362b6916DepLayer?.Properties).toEqual({
      LayerName: "MyStack6ab0e0e1-Fn1362b6916-DepLayer",
      Description: "Dependency layer for function Fn1",
      ContentUri: layerRoot,
      RetentionPolicy: "Delete",
      CompatibleRuntimes: ["python3.11"],
    });
  });

  it("writes to the output path with relative paths rebased", () => {
    const write = vi.fn<(text: string) => void>();
    const logger = createFakeLogger();
    const output = join(root, "out", "template.yaml");

    const patched = runGenerate({ ...config, output }, logger, write);

    expect(write).not.toHaveBeenCalled();
    expect(patched.Resources?.Fn1?.Properties?.CodeUri).toBe("src/");
    const written = parseTemplate(readFileSync(output, "utf8"));
    expect(written.Resources?.Fn1?.Properties?.CodeUri).toBe("../src");
    expect(written.Resources?.Fn1?.Properties?.Layers).toEqual([LAYER_REF]);
    expect(logger.info).toHaveBeenCalledWith("Wrote patched template", { location: output });
  });

  it("leaves the template unchanged when no function was built", () => {
    writeFileSync(config.buildResult, JSON.stringify({ artifacts: {} }));
    const write = vi.fn<(text: string) => void>();

    const patched = runGenerate(config, createFakeLogger(), write);

    expect(patched.Resources?.Fn1?.Properties?.Layers).toBeUndefined();
    expect(patched.Resources?.AwsSamAutoDependencyLayerNestedStack).toBeUndefined();
    expect(existsSync(join(config.buildDir, "nested_template.yaml"))).toBe(false);
  });
});
