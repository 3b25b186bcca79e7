import { describe, expect, it } from "vitest";
import {
  buildGraphUrl,
  toQueryString,
} from "../../src/utils/url-builder-util.ts";

describe("utils/url-builder-util", () => {
  it("builds unversioned Graph URLs by default", () => {
    expect(buildGraphUrl("me", { fields: "name" })).toBe(
      "https://graph.facebook.com/me?fields=name",
    );
  });

  it("adds the API version and trims stray slashes", () => {
    expect(
      buildGraphUrl("/me/friends", { limit: 10 }, {
        baseUrl: "https://graph.example.com/",
        apiVersion: "v19.0",
      }),
    ).toBe("https://graph.example.com/v19.0/me/friends?limit=10");
  });

  it("omits the query string when there are no params", () => {
    expect(buildGraphUrl("me")).toBe("https://graph.facebook.com/me");
  });

  it("escapes values and stringifies scalars", () => {
    expect(
      toQueryString({ message: "a&b c", published: false, limit: 5 }),
    ).toBe("message=a%26b+c&published=false&limit=5");
  });
});
