export * from './ambiguous-value';
export * from './datelike-value';
export * from './datetime-collection';
export * from './direction';
export * from './matchable';
export * from './meridiem';
export * from './partial-date';
export * from './partial-datetime';
export * from './partial-time';
export * from './semantic-value';
export * from './timedelta';
export * from './unknown-text';
