/**
 * Prebuilt pipelines and step helpers for common agent line-ups.
 */

import { Workflow } from "./workflow.js";

export function addResearchStep(workflow: Workflow, topic: string, agentName = "research_assistant"): Workflow {
  return workflow.addStep(
    "research",
    agentName,
    `Research the latest information about: ${topic}. Provide comprehensive and accurate information.`,
    { temperature: 0.3, maxTokens: 1200 }
  );
}

export function addWritingStep(workflow: Workflow, contentType = "article", agentName = "content_creator"): Workflow {
  return workflow.addStep(
    "write_content",
    agentName,
    `Based on the research, write a professional ${contentType}. Make it engaging and well-structured.`,
    { temperature: 0.7, maxTokens: 1500 }
  );
}

export function addReviewStep(
  workflow: Workflow,
  criteria = "accuracy, clarity, tone",
  agentName = "qa_specialist"
): Workflow {
  return workflow.addStep(
    "review",
    agentName,
    `Review the content for: ${criteria}. Provide constructive feedback and suggestions.`,
    {
      functionName: "text_processing",
      parameters: { operation: "quality_review", criteria }
    }
  );
}

export function addCodeGenerationStep(
  workflow: Workflow,
  requirements: string,
  language = "python",
  agentName = "code_assistant"
): Workflow {
  return workflow.addStep(
    "generate_code",
    agentName,
    `Generate ${language} code for: ${requirements}. Include proper error handling and documentation.`,
    { temperature: 0.2, maxTokens: 1500 }
  );
}

/** research -> write -> review */
export function contentCreationWorkflow(topic: string, audience = "general audience", contentType = "article"): Workflow {
  const workflow = new Workflow("content_creation", {
    name: "Content Creation Pipeline",
    description: `Research, write, and review content about ${topic}`,
    globalContext: { topic, audience, content_type: contentType }
  });
  addResearchStep(workflow, topic);
  addWritingStep(workflow, contentType);
  addReviewStep(workflow);
  return workflow;
}

/** generate -> review -> document */
export function codeDevelopmentWorkflow(requirements: string, language = "python"): Workflow {
  const workflow = new Workflow("code_development", {
    name: "Code Development Pipeline",
    description: `Generate, review, and document ${language} code`,
    globalContext: { requirements, language }
  });
  addCodeGenerationStep(workflow, requirements, language);
  addReviewStep(workflow, "code quality, security, best practices");
  workflow.addStep(
    "document",
    "content_creator",
    `Create comprehensive documentation for the ${language} code including usage examples and API reference`,
    { temperature: 0.3 }
  );
  return workflow;
}

/** prepare -> analyze -> insights */
export function dataAnalysisWorkflow(dataDescription: string, analysisType = "statistical summary"): Workflow {
  const workflow = new Workflow("data_analysis", {
    name: "Data Analysis Pipeline",
    description: `Analyze ${dataDescription} and generate insights`,
    globalContext: { data_description: dataDescription, analysis_type: analysisType }
  });
  workflow
    .addStep("prepare_data", "data_analyst", `Prepare and validate the ${dataDescription} for ${analysisType}`, {
      functionName: "data_analysis",
      parameters: { operation: "data_preparation" }
    })
    .addStep("analyze", "data_analyst", `Perform ${analysisType} on the prepared data`, {
      functionName: "data_analysis",
      parameters: { operation: "statistical_analysis" }
    })
    .addStep(
      "generate_insights",
      "research_assistant",
      `Based on the ${analysisType} results, generate key insights and actionable recommendations`,
      { temperature: 0.4 }
    );
  return workflow;
}

export const TEMPLATE_KINDS = ["content", "code", "data"] as const;

export type TemplateKind = (typeof TEMPLATE_KINDS)[number];

export function buildTemplate(kind: TemplateKind, subject: string): Workflow {
  switch (kind) {
    case "content":
      return contentCreationWorkflow(subject);
    case "code":
      return codeDevelopmentWorkflow(subject);
    case "data":
      return dataAnalysisWorkflow(subject);
  }
}
