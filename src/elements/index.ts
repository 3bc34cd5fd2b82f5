/**
 * Element catalog
 *
 * Presets over Element: a fixed tag name, a few attributes, and the
 * closing-tag rule. None of them change how rendering works.
 */

export { title, style, script, meta, rel, base } from './head.js';
export { Cell, cell, headerCell } from './table.js';
export {
  paragraph,
  heading,
  bold,
  italic,
  strong,
  span,
  div,
  mark,
  time,
  lineBreak,
  anchor,
  image,
  list,
  listItem,
} from './text.js';
export type { HeadingLevel } from './text.js';
export {
  header,
  footer,
  section,
  article,
  nav,
  aside,
  main,
  figure,
  figcaption,
  details,
  summary,
} from './sections.js';
export {
  form,
  Input,
  input,
  inputRadio,
  inputCheckbox,
  inputText,
  inputNumber,
  inputRange,
  inputDate,
  inputTime,
  inputEmail,
  inputUrl,
  inputPassword,
  inputSubmit,
  inputReset,
  inputList,
  TextArea,
  textArea,
  dataList,
  select,
  Option,
  option,
} from './forms.js';
