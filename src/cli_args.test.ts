import { describe, it, expect } from "vitest";
import { parseCliArgs } from "./cli_args.js";

describe("parseCliArgs", () => {
  it("takes a bare code", () => {
    expect(parseCliArgs(["AAECAQcG"])).toEqual({ text: "AAECAQcG" });
  });

  it("reads comp, mode and title flags", () => {
    expect(
      parseCliArgs(["AAECAQcG", "--comp=AAEBAQ", "--mode=Twist", "--title=My Deck"])
    ).toEqual({ text: "AAECAQcG", comp: "AAEBAQ", mode: "Twist", title: "My Deck" });
  });

  it("joins non-flag arguments back into pasted text", () => {
    expect(parseCliArgs(["###", "Big", "Warrior", "AAECAQcG"]).text).toBe(
      "### Big Warrior AAECAQcG"
    );
  });

  it("ignores empty flag values", () => {
    expect(parseCliArgs(["AAECAQcG", "--mode="])).toEqual({ text: "AAECAQcG" });
  });

  it("keeps unknown flags as text", () => {
    expect(parseCliArgs(["--image", "AAECAQcG"]).text).toBe("--image AAECAQcG");
  });
});
