/**
 * Clarifier
 * Vagueness detection, clarification questions and category enrichment
 */

import {
  UNCLASSIFIED,
  type Classification,
  type ClarificationQuestion,
  type PriorAnswers,
  type QueryAnalysis,
} from '../../models/Query.js';
import { findCategory, type CategoryCatalog, type CategoryDefinition } from './categoryCatalog.js';

function answered(priorAnswers: PriorAnswers, field: string): boolean {
  const value = priorAnswers[field];
  return typeof value === 'string' && value.trim() !== '';
}

/**
 * Required fields neither answered earlier nor stated in the question
 */
export function findUnresolvedFields(
  question: string,
  category: CategoryDefinition,
  priorAnswers: PriorAnswers
): string[] {
  return category.requiredFields
    .filter((field) => !answered(priorAnswers, field.field))
    .filter((field) => !field.indicators.some((pattern) => pattern.test(question)))
    .map((field) => field.field);
}

export function hasGenericQualifier(question: string, catalog: CategoryCatalog): boolean {
  return catalog.genericQualifiers.some((pattern) => pattern.test(question));
}

export function hasConcreteEntity(question: string, category: CategoryDefinition): boolean {
  return category.entityPatterns.some((pattern) => pattern.test(question));
}

function matchesMajor(majors: string[] | undefined, major: string | undefined): boolean {
  if (!majors || !major) return true;
  const wanted = major.trim().toLowerCase();
  return majors.some((m) => {
    const candidate = m.toLowerCase();
    return candidate.includes(wanted) || wanted.includes(candidate);
  });
}

function emptyAnalysis(classification: Classification): QueryAnalysis {
  return {
    category: UNCLASSIFIED,
    categoryConfidence: classification.confidence,
    vague: false,
    unresolvedFields: [],
    clarificationQuestions: [],
    followUpQuestions: [],
    actionItems: [],
    relatedTopics: [],
  };
}

/**
 * Analyze a classified question.
 *
 * Vague when the question uses a generic qualifier, names no concrete entity
 * of its category, and the category still has unresolved required fields.
 * Clarification questions are only produced for vague questions.
 */
export function analyzeQuestion(
  question: string,
  classification: Classification,
  catalog: CategoryCatalog,
  priorAnswers: PriorAnswers = {}
): QueryAnalysis {
  const category = findCategory(catalog, classification.category);
  if (classification.category === UNCLASSIFIED || !category) {
    return emptyAnalysis(classification);
  }

  const unresolvedFields = findUnresolvedFields(question, category, priorAnswers);
  const vague =
    hasGenericQualifier(question, catalog) &&
    !hasConcreteEntity(question, category) &&
    unresolvedFields.length > 0;

  const clarificationQuestions: ClarificationQuestion[] = vague
    ? category.requiredFields
        .filter((field) => unresolvedFields.includes(field.field))
        .map((field) => ({
          question: field.question,
          options: [...field.options],
          context: field.context,
          fieldName: field.field,
        }))
    : [];

  const resolved = new Set(
    category.requiredFields.map((field) => field.field).filter((field) => !unresolvedFields.includes(field))
  );
  for (const [field, value] of Object.entries(priorAnswers)) {
    if (value.trim() !== '') resolved.add(field);
  }

  const { limits } = catalog;

  const followUpQuestions = category.followUpQuestions
    .filter((followUp) => !followUp.field || !resolved.has(followUp.field))
    .map((followUp) => followUp.question)
    .slice(0, limits.followUpQuestions);

  const relatedTopics = category.relatedTopics
    .filter((entry) => matchesMajor(entry.majors, priorAnswers.major))
    .map((entry) => entry.topic)
    .slice(0, limits.relatedTopics);

  return {
    category: category.name,
    categoryConfidence: classification.confidence,
    vague,
    unresolvedFields,
    clarificationQuestions,
    followUpQuestions,
    actionItems: category.actionItems.slice(0, limits.actionItems),
    relatedTopics,
  };
}
