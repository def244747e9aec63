/**
 * Central export for state management
 */

export { QuizStateManager, createDefaultQuizState, type QuizStateListener } from "./quiz.state";
