import { describe, expect, it } from "vitest";
import {
  TEMPLATE_KINDS,
  buildTemplate,
  codeDevelopmentWorkflow,
  contentCreationWorkflow,
  dataAnalysisWorkflow
} from "../src/seqflow/workflow/templates.js";

describe("workflow templates", () => {
  it("content creation: research -> write -> review", () => {
    const workflow = contentCreationWorkflow("tidal energy");

    expect(workflow.workflowId).toBe("content_creation");
    expect(workflow.workflowName).toBe("Content Creation Pipeline");
    expect(workflow.steps.map((step) => step.stepId)).toEqual(["research", "write_content", "review"]);
    expect(workflow.agentNames()).toEqual(["research_assistant", "content_creator", "qa_specialist"]);
    expect(workflow.context).toEqual({ topic: "tidal energy", audience: "general audience", content_type: "article" });
  });

  it("review step runs text processing with its criteria", () => {
    const review = contentCreationWorkflow("tidal energy").steps.find((step) => step.stepId === "review");

    expect(review?.functionName).toBe("text_processing");
    expect(review?.parameters).toEqual({ operation: "quality_review", criteria: "accuracy, clarity, tone" });
  });

  it("research step is tuned for accuracy", () => {
    const [research] = contentCreationWorkflow("tidal energy").steps;

    expect(research?.temperature).toBe(0.3);
    expect(research?.maxTokens).toBe(1200);
    expect(research?.prompt).toBe(
      "Research the latest information about: tidal energy. Provide comprehensive and accurate information."
    );
  });

  it("code development: generate -> review -> document", () => {
    const workflow = codeDevelopmentWorkflow("a CSV parser", "typescript");

    expect(workflow.workflowId).toBe("code_development");
    expect(workflow.steps.map((step) => step.stepId)).toEqual(["generate_code", "review", "document"]);
    expect(workflow.steps[0]?.temperature).toBe(0.2);
    expect(workflow.context).toEqual({ requirements: "a CSV parser", language: "typescript" });
  });

  it("code development defaults to python", () => {
    expect(codeDevelopmentWorkflow("a CSV parser").context).toEqual({ requirements: "a CSV parser", language: "python" });
  });

  it("data analysis: prepare -> analyze -> insights", () => {
    const workflow = dataAnalysisWorkflow("monthly sales figures");

    expect(workflow.workflowId).toBe("data_analysis");
    expect(workflow.steps.map((step) => step.stepId)).toEqual(["prepare_data", "analyze", "generate_insights"]);
    expect(workflow.agentNames()).toEqual(["data_analyst", "research_assistant"]);
    expect(workflow.steps[0]?.parameters).toEqual({ operation: "data_preparation" });
  });

  it("buildTemplate covers every kind", () => {
    expect(TEMPLATE_KINDS.map((kind) => buildTemplate(kind, "subject").workflowId)).toEqual([
      "content_creation",
      "code_development",
      "data_analysis"
    ]);
  });
});
