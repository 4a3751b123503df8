import { describe, it, expect } from "vitest";
import { screen } from "@testing-library/react";
import userEvent from "@testing-library/user-event";
import { ScatterConfigForm } from "../../components/ScatterConfigForm.tsx";
import { renderWithSession } from "../renderWithSession.tsx";

describe("ScatterConfigForm", () => {
  it("adds a view with the chosen axes and default sizing", async () => {
    const user = userEvent.setup();
    const { session } = renderWithSession(<ScatterConfigForm />);

    await user.selectOptions(screen.getByTestId("scatter-y"), "name");
    await user.click(screen.getByTestId("add-scatter-button"));

    const [view] = session.scatter.getState().views;
    expect(view.id).toBe("scatter-1");
    expect(view.spec).toMatchObject({ x: "score", y: "name", size: null, minSize: 5, maxSize: 20 });
  });

  it("resolves the colour mode from the colour column", async () => {
    const user = userEvent.setup();
    const { session } = renderWithSession(<ScatterConfigForm />);

    await user.selectOptions(screen.getByTestId("scatter-color"), "group");
    await user.click(screen.getByTestId("add-scatter-button"));

    expect(session.scatter.getState().views[0].spec.colorMode).toBe("discrete");
  });

  it("shows the error for a non-numeric size column", async () => {
    const user = userEvent.setup();
    const { session } = renderWithSession(<ScatterConfigForm />);

    await user.selectOptions(screen.getByTestId("scatter-size"), "group");
    await user.click(screen.getByTestId("add-scatter-button"));

    expect(screen.getByTestId("scatter-error")).toBeInTheDocument();
    expect(session.scatter.getState().views).toHaveLength(0);
  });

  it("rejects continuous colour on a categorical column", async () => {
    const user = userEvent.setup();
    const { session } = renderWithSession(<ScatterConfigForm />);

    await user.selectOptions(screen.getByTestId("scatter-color"), "group");
    await user.selectOptions(screen.getByTestId("scatter-color-mode"), "continuous");
    await user.click(screen.getByTestId("add-scatter-button"));

    expect(session.scatter.getState().lastError?.kind).toBe("InvalidColorMode");
  });
});
