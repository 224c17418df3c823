import { beforeEach, describe, expect, it } from "vitest";
import { NavigationHistory } from "./navigation-history.js";

describe("NavigationHistory", () => {
  let history: NavigationHistory;

  beforeEach(() => {
    history = new NavigationHistory();
  });

  it("starts empty", () => {
    expect(history.current()).toBeNull();
    expect(history.canGoBack()).toBe(false);
    expect(history.canGoForward()).toBe(false);
    expect(history.back()).toBe(false);
    expect(history.forward()).toBe(false);
  });

  it("ignores navigating to the current directory", () => {
    expect(history.navigateTo("/a")).toBe(true);
    expect(history.navigateTo("/a")).toBe(false);
    expect(history.entries()).toEqual(["/a"]);
  });

  it("moves back and forward within bounds", () => {
    history.navigateTo("/a");
    history.navigateTo("/b");
    history.navigateTo("/c");

    expect(history.back()).toBe(true);
    expect(history.current()).toBe("/b");
    expect(history.back()).toBe(true);
    expect(history.current()).toBe("/a");
    expect(history.back()).toBe(false);
    expect(history.position()).toBe(2);

    expect(history.forward()).toBe(true);
    expect(history.current()).toBe("/b");
    expect(history.forward()).toBe(true);
    expect(history.current()).toBe("/c");
    expect(history.forward()).toBe(false);
    expect(history.position()).toBe(0);
  });

  it("restores the current directory after back then forward", () => {
    history.navigateTo("/a");
    history.navigateTo("/b");

    history.back();
    history.forward();

    expect(history.current()).toBe("/b");
    expect(history.entries()).toEqual(["/a", "/b"]);
  });

  it("discards forward entries when navigating after going back", () => {
    history.navigateTo("/a");
    history.navigateTo("/b");
    history.navigateTo("/c");
    history.back();
    history.back();

    expect(history.navigateTo("/d")).toBe(true);

    expect(history.entries()).toEqual(["/a", "/d"]);
    expect(history.position()).toBe(0);
    expect(history.canGoForward()).toBe(false);
    expect(history.canGoBack()).toBe(true);
  });

  it("re-pushes an abandoned forward entry instead of jumping to it", () => {
    history.navigateTo("/a");
    history.navigateTo("/b");
    history.back();

    expect(history.navigateTo("/b")).toBe(true);
    expect(history.entries()).toEqual(["/a", "/b"]);
    expect(history.current()).toBe("/b");
  });

  it("clears every entry", () => {
    history.navigateTo("/a");
    history.navigateTo("/b");
    history.back();

    history.clear();

    expect(history.entries()).toEqual([]);
    expect(history.position()).toBe(0);
    expect(history.current()).toBeNull();
  });
});
