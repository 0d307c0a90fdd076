import assert from "node:assert/strict";
import test from "node:test";
import { FakeBuildService, fakeServiceFactory } from "../testing/fakes.js";
import { discoverProjects, listRegionOptions } from "./discovery.js";
import { CODEBUILD_REGIONS } from "./regions.js";

test.before(() => {
  process.env.LOG_SILENT = "true";
});

test.after(() => {
  delete process.env.LOG_SILENT;
});

test("discoverProjects lists sorted projects for the profile and region", async () => {
  const service = new FakeBuildService();
  service.projects = ["zeta", "alpha", "mid"];
  const { factory, calls } = fakeServiceFactory(service);

  const projects = await discoverProjects(
    { credentialsId: "ci", region: "eu-west-1" },
    { factory, resolveRegion: async () => "us-east-1" }
  );

  assert.deepEqual(projects, ["alpha", "mid", "zeta"]);
  assert.deepEqual(calls, [{ credentialsId: "ci", region: "eu-west-1", proxy: undefined }]);
});

test("discoverProjects falls back to the default region", async () => {
  const { factory, calls } = fakeServiceFactory(new FakeBuildService());
  await discoverProjects({}, { factory, resolveRegion: async () => "ap-south-1" });
  assert.equal(calls[0]?.region, "ap-south-1");
});

test("discoverProjects yields an empty list without a region", async () => {
  const { factory, calls } = fakeServiceFactory(new FakeBuildService());
  assert.deepEqual(await discoverProjects({ region: "" }, { factory, resolveRegion: async () => null }), []);
  assert.equal(calls.length, 0);
});

test("discoverProjects yields an empty list when the client fails", async () => {
  const service = new FakeBuildService();
  service.listError = new Error("Could not load credentials from any providers");
  const { factory } = fakeServiceFactory(service);

  assert.deepEqual(await discoverProjects({ region: "us-east-1" }, { factory, resolveRegion: async () => null }), []);

  const throwingFactory = () => {
    throw new Error("profile not found");
  };
  assert.deepEqual(
    await discoverProjects({ credentialsId: "missing", region: "us-east-1" }, { factory: throwingFactory, resolveRegion: async () => null }),
    []
  );
});

test("listRegionOptions puts the default region first", async () => {
  const options = await listRegionOptions(async () => "eu-west-1");
  assert.equal(options[0], "eu-west-1");
  assert.equal(options.length, CODEBUILD_REGIONS.length);
  assert.equal(options.filter((region) => region === "eu-west-1").length, 1);

  assert.deepEqual(await listRegionOptions(async () => null), CODEBUILD_REGIONS);
});
