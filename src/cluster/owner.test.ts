import { describe, expect, it } from "vitest";
import { readOwner } from "./owner.js";

const keys = { user: ["user", "user_name"], team: ["team", "team_name"] };

describe("readOwner", () => {
  it("reads the first present key", () => {
    expect(readOwner({ user: "alice", team: "ml-team" }, keys)).toEqual({ user: "alice", team: "ml-team" });
    expect(readOwner({ user_name: "bob", team_name: "infra" }, keys)).toEqual({ user: "bob", team: "infra" });
  });

  it("skips blank values", () => {
    expect(readOwner({ user: "  ", user_name: "carol" }, keys)).toEqual({ user: "carol", team: null });
  });

  it("reports unknown owners as null", () => {
    expect(readOwner(undefined, keys)).toEqual({ user: null, team: null });
    expect(readOwner({ unrelated: "x" }, keys)).toEqual({ user: null, team: null });
  });
});
