import type { RecordTable } from "../records/types";
import {
  booksPerPublisher,
  busiestPublicationMonth,
  countDistinctTitles,
  countMultiAuthor,
  countWithoutGoodreads,
  longestWords,
  medianPageCount,
  mostRecentPublication,
  mostUpdatedYear,
  secondBookOfTopAuthor,
  titleWithMostIsbns,
  topPublisherAuthorPair,
} from "./queries";
import type { AnswerSet } from "./types";

export function computeAnswers(table: RecordTable): AnswerSet {
  return {
    1: countDistinctTitles(table),
    2: titleWithMostIsbns(table),
    3: countWithoutGoodreads(table),
    4: countMultiAuthor(table),
    5: booksPerPublisher(table),
    6: medianPageCount(table),
    7: busiestPublicationMonth(table),
    8: longestWords(table),
    9: mostRecentPublication(table),
    10: mostUpdatedYear(table),
    11: secondBookOfTopAuthor(table),
    12: topPublisherAuthorPair(table),
  };
}

export * from "./queries";
export * from "./types";
