import { StderrLogger } from "../src/cli/stderr-logger";

describe("StderrLogger", () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("should write every level to stderr", () => {
    const stderr = jest.spyOn(process.stderr, "write").mockImplementation(() => true);
    const stdout = jest.spyOn(process.stdout, "write").mockImplementation(() => true);
    const logger = new StderrLogger("Test");

    logger.log("loaded");
    logger.error("failed");

    expect(stdout).not.toHaveBeenCalled();
    expect(stderr).toHaveBeenCalledTimes(2);
    expect(String(stderr.mock.calls[0][0])).toContain("loaded");
    expect(String(stderr.mock.calls[1][0])).toContain("failed");
  });

  it("should respect the configured levels", () => {
    const stderr = jest.spyOn(process.stderr, "write").mockImplementation(() => true);
    const logger = new StderrLogger("Test");
    logger.setLogLevels(["error"]);

    logger.warn("ignored");

    expect(stderr).not.toHaveBeenCalled();
  });
});
