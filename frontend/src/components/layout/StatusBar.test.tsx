// @vitest-environment jsdom
import React from "react";
import { cleanup, render, screen } from "@testing-library/react";
import { afterEach, describe, expect, it } from "vitest";
import { StatusBar } from "./StatusBar";

describe("StatusBar", () => {
  afterEach(() => {
    cleanup();
  });

  it("renders connection state and feed counts", () => {
    render(
      <StatusBar
        connected={true}
        commitCount={12}
        repositoryCount={3}
        message={null}
      />,
    );

    expect(screen.getByText("connected")).toBeInTheDocument();
    expect(screen.getByText("repositories:3")).toBeInTheDocument();
    expect(screen.getByText("commits:12")).toBeInTheDocument();
    expect(screen.queryByRole("status")).not.toBeInTheDocument();
  });

  it("renders error messages next to the connection indicator", () => {
    render(
      <StatusBar
        connected={false}
        commitCount={0}
        repositoryCount={0}
        message={{ tone: "error", text: "Could not load commit history." }}
      />,
    );

    const message = screen.getByText("Could not load commit history.");
    const leftCluster = message.closest(".statusbar-left");

    expect(leftCluster).toContainElement(screen.getByText("disconnected"));
    expect(message).toHaveClass("status-message-error");
  });
});
