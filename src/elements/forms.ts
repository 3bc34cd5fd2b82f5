/**
 * Form elements
 *
 * Input carries shorthand setters for its common attributes. Boolean
 * attributes (checked, disabled, …) are set with an empty value so they
 * render as a bare name.
 *
 * @since 2026-10-19
 */

import { Element } from '../html/Element.js';

export function form(action?: string): Element<'form'> {
  const node = new Element('form', 'form');
  if (action !== undefined) {
    node.setAttribute('action', action);
  }
  return node;
}

/**
 * <input>
 */
export class Input extends Element<'input'> {
  constructor(type?: string, name?: string, value?: string, content = '') {
    super('input', 'input', content);
    if (type !== undefined) {
      this.setAttribute('type', type);
    }
    if (name !== undefined) {
      this.setAttribute('name', name);
    }
    if (value !== undefined) {
      this.setAttribute('value', value);
    }
  }

  size(size: number): this {
    return this.setAttribute('size', size);
  }

  maxlength(length: number): this {
    return this.setAttribute('maxlength', length);
  }

  placeholder(text: string): this {
    return this.setAttribute('placeholder', text);
  }

  min(value: string | number): this {
    return this.setAttribute('min', value);
  }

  max(value: string | number): this {
    return this.setAttribute('max', value);
  }

  checked(isChecked = true): this {
    if (isChecked) {
      this.setAttribute('checked', '');
    }
    return this;
  }

  autocomplete(): this {
    return this.setAttribute('autocomplete', '');
  }

  autofocus(): this {
    return this.setAttribute('autofocus', '');
  }

  disabled(): this {
    return this.setAttribute('disabled', '');
  }

  readonly(): this {
    return this.setAttribute('readonly', '');
  }

  required(): this {
    return this.setAttribute('required', '');
  }
}

export function input(type?: string, name?: string, value?: string, content = ''): Input {
  return new Input(type, name, value, content);
}

export function inputRadio(name: string, value?: string, content = ''): Input {
  return new Input('radio', name, value, content);
}

export function inputCheckbox(name: string, value?: string, content = ''): Input {
  return new Input('checkbox', name, value, content);
}

export function inputText(name: string, value?: string): Input {
  return new Input('text', name, value);
}

export function inputNumber(name: string, value?: string): Input {
  return new Input('number', name, value);
}

export function inputRange(name: string, value?: string): Input {
  return new Input('range', name, value);
}

export function inputDate(name: string, value?: string): Input {
  return new Input('date', name, value);
}

export function inputTime(name: string, value?: string): Input {
  return new Input('time', name, value);
}

export function inputEmail(name: string, value?: string): Input {
  return new Input('email', name, value);
}

export function inputUrl(name: string, value?: string): Input {
  return new Input('url', name, value);
}

export function inputPassword(name: string): Input {
  return new Input('password', name);
}

export function inputSubmit(value?: string, name?: string): Input {
  return new Input('submit', name, value);
}

export function inputReset(value?: string): Input {
  return new Input('reset', undefined, value);
}

/** Text input bound to a <datalist> by id */
export function inputList(name: string, listId: string): Input {
  return new Input(undefined, name).setAttribute('list', listId);
}

/**
 * <textarea>; always closed, cols and rows left out when 0
 */
export class TextArea extends Element<'textarea'> {
  constructor(name: string, cols = 0, rows = 0) {
    super('textarea', 'textarea', '', { forceClosingTag: true });
    this.setAttribute('name', name);
    if (cols > 0) {
      this.setAttribute('cols', cols);
    }
    if (rows > 0) {
      this.setAttribute('rows', rows);
    }
  }

  maxlength(length: number): this {
    return this.setAttribute('maxlength', length);
  }
}

export function textArea(name: string, cols = 0, rows = 0): TextArea {
  return new TextArea(name, cols, rows);
}

/** <datalist>, options for inputList() */
export function dataList(id: string): Element<'datalist'> {
  return new Element('datalist', 'datalist').setAttribute('id', id);
}

export function select(name: string): Element<'select'> {
  return new Element('select', 'select').setAttribute('name', name);
}

/**
 * <option> for select() and dataList(); always closed
 */
export class Option extends Element<'option'> {
  constructor(value: string, content = '') {
    super('option', 'option', content, { forceClosingTag: true });
    this.setAttribute('value', value);
  }

  selected(isSelected = true): this {
    if (isSelected) {
      this.setAttribute('selected', '');
    }
    return this;
  }
}

export function option(value: string, content = ''): Option {
  return new Option(value, content);
}
