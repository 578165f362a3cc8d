import { describe, it, expect } from "vitest";
import {
  DEFAULT_BACKEND_URL,
  loadOnboardingConfig,
  loginUrlFor,
} from "./config";
import { OnboardingError } from "../adapters/common/errors";

describe("loadOnboardingConfig", () => {
  it("applies defaults when nothing is set", () => {
    expect(loadOnboardingConfig("gcp", {}, {})).toEqual({
      provider: "gcp",
      backendUrl: DEFAULT_BACKEND_URL,
      allowControl: false,
      autoRun: false,
      explicitSelection: [],
      authToken: undefined,
      identityName: "gpubudget-connector",
      location: "eastus",
      templateFile: undefined,
    });
  });

  it("reads the environment", () => {
    const request = loadOnboardingConfig("gcp", {}, {
      BACKEND_URL: "https://backend.test/",
      ALLOW_CONTROL: "TRUE",
      AUTO_RUN: "true",
      PROJECT_IDS: "proj-a, proj-b",
      AUTH_TOKEN: "test-token",
      SA_NAME: "custom-connector",
    });

    expect(request.backendUrl).toBe("https://backend.test");
    expect(request.allowControl).toBe(true);
    expect(request.autoRun).toBe(true);
    expect(request.explicitSelection).toEqual(["proj-a", "proj-b"]);
    expect(request.authToken).toBe("test-token");
    expect(request.identityName).toBe("custom-connector");
  });

  it("lets flags override the environment", () => {
    const request = loadOnboardingConfig(
      "gcp",
      { projects: "proj-x", allowControl: "false", autoRun: true },
      { PROJECT_IDS: "proj-a", ALLOW_CONTROL: "true", AUTO_RUN: "false" }
    );

    expect(request.explicitSelection).toEqual(["proj-x"]);
    expect(request.allowControl).toBe(false);
    expect(request.autoRun).toBe(true);
  });

  it("accepts --project-ids as an alias", () => {
    expect(loadOnboardingConfig("gcp", { projectIds: "p1,p2" }, {}).explicitSelection).toEqual(["p1", "p2"]);
  });

  it("uses RESOURCE_GROUP and LOCATION for azure, not PROJECT_IDS", () => {
    const request = loadOnboardingConfig("azure", {}, {
      PROJECT_IDS: "proj-a",
      RESOURCE_GROUP: "rg-gpu",
      LOCATION: "westeurope",
    });

    expect(request.explicitSelection).toEqual(["rg-gpu"]);
    expect(request.location).toBe("westeurope");
  });

  it("treats an empty environment value as unset", () => {
    expect(loadOnboardingConfig("gcp", {}, { AUTH_TOKEN: "" }).authToken).toBeUndefined();
  });

  it("rejects a boolean it cannot read instead of defaulting to false", () => {
    expect(() => loadOnboardingConfig("gcp", { allowControl: "yes" }, {})).toThrow(OnboardingError);
    expect(() => loadOnboardingConfig("gcp", { allowControl: "yes" }, {})).toThrow(
      'Invalid configuration: allowControl: Expected "true" or "false", got "yes"'
    );
  });

  it("rejects an invalid service account name", () => {
    expect(() => loadOnboardingConfig("gcp", { saName: "Bad_Name" }, {})).toThrow(/identityName/);
  });
});

describe("loginUrlFor", () => {
  it("maps the api host to the app host", () => {
    expect(loginUrlFor("https://api.gpubudget.com")).toBe("https://app.gpubudget.com/login");
  });

  it("keeps other hosts as they are", () => {
    expect(loginUrlFor("http://localhost:4000")).toBe("http://localhost:4000/login");
  });
});
