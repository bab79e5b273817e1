import { describe, it, expect } from "vitest";
import { escapeXml, renderApprovalXml } from "../xml-renderer.ts";

describe("renderApprovalXml", () => {
  it("renders status and reasoning", () => {
    const xml = renderApprovalXml({
      approval: {
        status: "approved",
        riskLevel: "low",
        requirementCount: 1,
        recommendations: [],
        reasoning: "Project APPROVED for execution. 1 requirement identified; risk level low.",
      },
    });
    expect(xml).toBe(
      '<approval status="approved">Project APPROVED for execution. 1 requirement identified; risk level low.</approval>',
    );
  });

  it("escapes markup in the reasoning", () => {
    expect(escapeXml(`a < b & "c" > 'd'`)).toBe("a &lt; b &amp; &quot;c&quot; &gt; &apos;d&apos;");
  });
});
