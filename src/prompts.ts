/**
 * Prompt builders for every deliberation stage.
 *
 * Wording is free to change; the reply shapes requested here
 * ("Medical Field: a | b", "Key Knowledge:/Total Analysis:", yes/no,
 * "Answer: X") are what the parsers downstream expect.
 */

import { AnalysisMap, OptionMap, RevisionAdvice, StageName } from './types/index.js';

/** Completion budget per stage; every stage runs at temperature 0. */
export const STAGE_MAX_TOKENS: Record<StageName, number> = {
  S1_question_domain: 50,
  S1_options_domain: 50,
  S2_question_analysis: 300,
  S2_options_analysis: 300,
  S3_synth_report: 2500,
  S4_vote: 30,
  S4_advice: 500,
  S4_revision: 2500,
  S5_final: 2500,
};

export interface Prompt {
  systemRole: string;
  userInput: string;
}

function listOptions(options: Readonly<OptionMap>): string {
  return Object.entries(options)
    .map(([label, text]) => `(${label}) ${text}`)
    .join('\n');
}

/**
 * Evidence appendix for analysis prompts; nothing when there is no evidence.
 */
export function evidenceAppendix(evidenceContext: string): string {
  if (!evidenceContext) return '';
  return `

You are given optional external evidence excerpts. Use them if helpful. If you use evidence, cite it by its id like [E1]. If evidence is insufficient, say so and rely on your own knowledge.
Evidence:
${evidenceContext}
`;
}

export function questionDomainPrompt(question: string, count: number): Prompt {
  return {
    systemRole: 'You are a medical expert who specializes in categorizing a specific medical scenario into specific areas of medicine.',
    userInput: `
You need to complete the following steps:
1. Carefully read the medical scenario presented in the question: '''${question}'''.
2. Based on the medical scenario in it, classify the question into ${count} different subfields of medicine.
3. You should output in exactly the same format as: Medical Field: ${Array.from({ length: count }, (_, i) => `Field${i + 1}`).join(' | ')}
`.trim(),
  };
}

export function optionsDomainPrompt(question: string, options: Readonly<OptionMap>, count: number): Prompt {
  const optionsBlock = Object.keys(options).length > 0 ? `\nOptions:\n${listOptions(options)}` : '';
  return {
    systemRole: 'As a medical expert, you possess the ability to discern the two most relevant fields of expertise needed to address a multiple-choice question encapsulating a specific medical context.',
    userInput: `
You need to complete the following steps:
1. Carefully read the medical scenario presented in the question: '''${question}'''.${optionsBlock}
2. Classify the options into ${count} different subfields of medicine.
3. You should output in exactly the same format as: Medical Field: ${Array.from({ length: count }, (_, i) => `Field${i + 1}`).join(' | ')}
`.trim(),
  };
}

export function questionAnalysisPrompt(question: string, domain: string, evidenceContext: string): Prompt {
  return {
    systemRole: `You are a medical expert in the domain of ${domain}. From your area of specialization, you will scrutinize and diagnose the symptoms presented by patients in specific medical scenarios.`,
    userInput: `
Please meticulously examine the medical scenario outlined in this question: '''${question}'''.
Drawing upon your medical expertise, interpret the condition being depicted. Subsequently, identify and highlight the aspects of the issue that you find most alarming or noteworthy.
Please limit your analysis to 50 words.
`.trim() + evidenceAppendix(evidenceContext),
  };
}

export function optionsAnalysisPrompt(
  question: string,
  options: Readonly<OptionMap>,
  domain: string,
  questionAnalyses: AnalysisMap,
  evidenceContext: string
): Prompt {
  return {
    systemRole: `You are a medical expert specialized in the ${domain} domain. You are adept at comprehending the nexus between a patient's condition and potential treatment options.`,
    userInput: `
Question: '''${question}'''
Options:
${listOptions(options)}

Analyses of the question from several specialists:
${renderAnalyses(questionAnalyses)}

Please analyze each option from the perspective of ${domain}: weigh its relevance to the patient's condition and state whether it is a plausible answer. Please limit your analysis to 100 words.
`.trim() + evidenceAppendix(evidenceContext),
  };
}

/** Domain-labelled blocks, one per AnalysisMap entry, in order. */
export function renderAnalyses(analyses: AnalysisMap): string {
  return analyses.map(({ domain, analysis }) => `- ${domain} expert: ${analysis}`).join('\n');
}

export function synthesisPrompt(
  question: string,
  options: Readonly<OptionMap>,
  questionAnalyses: AnalysisMap,
  optionAnalyses: AnalysisMap
): Prompt {
  return {
    systemRole: 'You are a medical decision maker who excels at summarizing and synthesizing the analyses of experts from various domains.',
    userInput: `
Question: '''${question}'''
Options:
${listOptions(options)}

**Question analyses:**
${renderAnalyses(questionAnalyses)}

**Option analyses:**
${renderAnalyses(optionAnalyses)}

Extract the key knowledge from these analyses, then give a total analysis that reconciles them.
Output in exactly this format:
Key Knowledge: <key knowledge>
Total Analysis: <total analysis>
`.trim(),
  };
}

function voterRole(domain: string): string {
  return `You are a medical expert specialized in the ${domain} domain.`;
}

export function votePrompt(domain: string, report: string): Prompt {
  return {
    systemRole: voterRole(domain),
    userInput: `
Here is a medical report: ${report}
As a medical expert specialized in ${domain}, please carefully read the report and decide whether your opinions are consistent with it.
Please respond only with: [YES or NO].
`.trim(),
  };
}

export function advicePrompt(domain: string, report: string): Prompt {
  return {
    systemRole: voterRole(domain),
    userInput: `
Here is a medical report: ${report}
As a medical expert specialized in ${domain}, you disagree with parts of this report. Please give your revision advice: name what is wrong and what the report should say instead. Keep it under 100 words.
`.trim(),
  };
}

export function revisionPrompt(report: string, advice: RevisionAdvice): Prompt {
  const adviceBlock = Object.entries(advice)
    .map(([domain, text]) => `- ${domain} expert: ${text}`)
    .join('\n');
  return {
    systemRole: '',
    userInput: `
Here is the original report: ${report}

Here is the advice from medical experts on the report:
${adviceBlock}

Based on the advice, revise the original report. Keep what the experts did not dispute.
Output in exactly this format:
Key Knowledge: <revised key knowledge>
Total Analysis: <revised total analysis>
`.trim(),
  };
}

export function finalDecisionPrompt(report: string, labels: readonly string[]): Prompt {
  const format = labels.length > 0
    ? `Answer: <one of ${labels.join(', ')}>`
    : 'Answer: <your answer>';
  return {
    systemRole: '',
    userInput: `
Here is a synthesized report: ${report}
Based on the report, give your rationale, then your final answer on the last line.
Output in exactly this format:
Rationale: <rationale>
${format}
`.trim(),
  };
}
