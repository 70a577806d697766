import { describe, expect, it } from "vitest";
import { EmbeddingUnavailableError } from "../../../src/errors.js";
import { classifyModelError, remediationMessage } from "../../../src/services/modelErrors.js";
import { FakeApiError } from "../../helpers/FakeLLMService.js";

describe("classifyModelError", () => {
  it("classifies by HTTP status first", () => {
    expect(classifyModelError(new FakeApiError(503))).toEqual({
      category: "transient",
      retryable: true,
      status: 503,
      detail: "Request failed with status 503"
    });
    expect(classifyModelError(new FakeApiError(401)).category).toBe("unauthorized");
    expect(classifyModelError(new FakeApiError(403)).category).toBe("unauthorized");
    expect(classifyModelError(new FakeApiError(400)).category).toBe("invalid_request");
  });

  it("does not treat rate limiting as retryable", () => {
    const classified = classifyModelError(new FakeApiError(429));

    expect(classified.category).toBe("rate_limited");
    expect(classified.retryable).toBe(false);
  });

  it("treats network error codes as transient", () => {
    const error = Object.assign(new Error("socket hang up"), { code: "ECONNRESET" });

    expect(classifyModelError(error).category).toBe("transient");
  });

  it("falls back to the error message", () => {
    expect(classifyModelError(new Error("Request timed out.")).category).toBe("transient");
    expect(classifyModelError(new Error("You exceeded your current quota")).category).toBe("rate_limited");
    expect(classifyModelError(new Error("Incorrect API key provided")).category).toBe("unauthorized");
    expect(classifyModelError(new Error("boom")).category).toBe("unknown");
  });

  it("recognises an unavailable embedding service", () => {
    const classified = classifyModelError(new EmbeddingUnavailableError("Embedding service unavailable: down"));

    expect(classified.category).toBe("embedding_unavailable");
    expect(classified.retryable).toBe(false);
  });
});

describe("remediationMessage", () => {
  it("gives category-specific guidance", () => {
    const message = remediationMessage(classifyModelError(new FakeApiError(401)));

    expect(message.split("\n")[0]).toBe(
      "Authentication failed with the language model service. Please verify:"
    );
  });

  it("includes the error detail for unknown failures", () => {
    expect(remediationMessage(classifyModelError(new Error("boom")))).toBe(
      [
        "I encountered an error while processing your question:",
        "boom",
        "",
        "Troubleshooting tips:",
        "• Check your internet connection",
        "• Verify your API key is valid",
        "• Try asking a simpler question"
      ].join("\n")
    );
  });
});
