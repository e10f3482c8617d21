import { describe, it, expect } from "vitest";
import {
  InvalidParameterError,
  AlreadyRunningError,
  NotRunningError,
  NodeNotFoundError,
  FabricError,
  RouteNotFoundError,
  ValidationError,
  getHttpStatus,
  toErrorBody,
} from "../index";

describe("Error Types", () => {
  describe("InvalidParameterError", () => {
    it("creates error with correct properties", () => {
      const error = new InvalidParameterError({
        message: "n_nodes must be a positive integer",
        parameter: "n_nodes",
      });

      expect(error.message).toBe("n_nodes must be a positive integer");
      expect(error.parameter).toBe("n_nodes");
      expect(error._tag).toBe("InvalidParameterError");
    });

    it("type guard works correctly", () => {
      const error = new InvalidParameterError({ message: "test", parameter: "n_paths" });

      expect(InvalidParameterError.is(error)).toBe(true);
      expect(InvalidParameterError.is(new Error("test"))).toBe(false);
      expect(InvalidParameterError.is(null)).toBe(false);
    });
  });

  describe("NodeNotFoundError", () => {
    it("creates error with correct properties", () => {
      const error = new NodeNotFoundError({ message: "Node 'n9' not found", node: "n9" });

      expect(error.message).toBe("Node 'n9' not found");
      expect(error.node).toBe("n9");
      expect(error._tag).toBe("NodeNotFoundError");
    });
  });

  describe("FabricError", () => {
    it("creates error with correct properties", () => {
      const error = new FabricError({
        message: "Command failed on r1",
        command: "sysctl -w net.ipv4.ip_forward=1",
        exitCode: 255,
        stderr: "permission denied",
      });

      expect(error.message).toBe("Command failed on r1");
      expect(error.command).toBe("sysctl -w net.ipv4.ip_forward=1");
      expect(error.exitCode).toBe(255);
      expect(error.stderr).toBe("permission denied");
      expect(error._tag).toBe("FabricError");
    });

    it("has optional fields", () => {
      const error = new FabricError({ message: "fabric down" });

      expect(error.command).toBeUndefined();
      expect(error.exitCode).toBeUndefined();
    });

    it("type guard distinguishes tags", () => {
      const error = new FabricError({ message: "test" });

      expect(FabricError.is(error)).toBe(true);
      expect(NotRunningError.is(error)).toBe(false);
    });
  });

  describe("RouteNotFoundError", () => {
    it("creates error with correct properties", () => {
      const error = new RouteNotFoundError({ message: "Not found", path: "/nope", method: "POST" });

      expect(error.path).toBe("/nope");
      expect(error.method).toBe("POST");
      expect(error._tag).toBe("RouteNotFoundError");
    });
  });
});

describe("getHttpStatus", () => {
  it("returns 400 for parameter and lifecycle errors", () => {
    expect(getHttpStatus(new InvalidParameterError({ message: "bad", parameter: "n_nodes" }))).toBe(400);
    expect(getHttpStatus(new AlreadyRunningError({ message: "running" }))).toBe(400);
    expect(getHttpStatus(new NotRunningError({ message: "stopped" }))).toBe(400);
    expect(getHttpStatus(new ValidationError({ message: "bad config" }))).toBe(400);
  });

  it("returns 404 for unknown nodes and routes", () => {
    expect(getHttpStatus(new NodeNotFoundError({ message: "missing", node: "x" }))).toBe(404);
    expect(getHttpStatus(new RouteNotFoundError({ message: "missing", path: "/x", method: "GET" }))).toBe(404);
  });

  it("returns 500 for FabricError", () => {
    expect(getHttpStatus(new FabricError({ message: "boom" }))).toBe(500);
  });
});

describe("toErrorBody", () => {
  it("uses message for 400 responses", () => {
    expect(toErrorBody(400, "Network already running")).toEqual({ message: "Network already running" });
  });

  it("uses error for everything else", () => {
    expect(toErrorBody(404, "Not found")).toEqual({ error: "Not found" });
    expect(toErrorBody(500, "boom")).toEqual({ error: "boom" });
  });
});
