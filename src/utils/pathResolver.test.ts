import { describe, it, expect, afterEach } from "vitest";
import { homedir } from "node:os";
import { join } from "node:path";
import {
  getConfigPath,
  getCredentialsPath,
  getLogDir,
  getMaskmailHome,
  getSessionDir,
} from "./pathResolver.js";

const originalHome = process.env["MASKMAIL_HOME"];

afterEach(() => {
  if (originalHome === undefined) {
    delete process.env["MASKMAIL_HOME"];
  } else {
    process.env["MASKMAIL_HOME"] = originalHome;
  }
});

describe("pathResolver", () => {
  it("defaults to ~/.maskmail", () => {
    delete process.env["MASKMAIL_HOME"];

    expect(getMaskmailHome()).toBe(join(homedir(), ".maskmail"));
    expect(getLogDir()).toBe(join(homedir(), ".maskmail", "logs"));
  });

  it("places every file under MASKMAIL_HOME", () => {
    process.env["MASKMAIL_HOME"] = "/tmp/maskmail-home";

    expect(getConfigPath()).toBe(join("/tmp/maskmail-home", "config.json"));
    expect(getSessionDir()).toBe(join("/tmp/maskmail-home", "session"));
    expect(getCredentialsPath()).toBe(join("/tmp/maskmail-home", "credentials.enc"));
    expect(getLogDir()).toBe(join("/tmp/maskmail-home", "logs"));
  });
});
