/**
 * Browser-side probe scripts. Each builder returns a self-contained
 * expression string for `frame.evaluate()`; string form keeps bundlers
 * from injecting helpers the page does not have.
 */

import type { ControlKind } from '../engine/types';

const LOADING_SELECTOR = '.loading, .spinner, .ant-spin-spinning, .el-loading-mask';

const CONTROL_SELECTOR =
  'input, textarea, select, [contenteditable="true"], [role="textbox"], [role="combobox"], [role="spinbutton"]';

const EXCLUDED_INPUT_TYPES = ['hidden', 'button', 'submit', 'reset', 'image', 'file'];

const INDICATOR_SELECTORS = [
  '#current-page-display',
  '.current-page-display',
  '.page-num.current',
  '.pagination .active',
  '.ant-pagination-item-active',
  '.el-pager .active',
];

const FIRST_ROW_SELECTORS = ['.row-num', 'table tbody tr td:first-child'];

function args(value: unknown): string {
  return JSON.stringify(value);
}

// ── Shared helpers (injected into every script) ───────────────────────

const HELPERS = `
  function __resolve(sel) {
    if (sel.charAt(0) === '/' || sel.charAt(0) === '(') {
      try {
        return document.evaluate(sel, document, null, XPathResult.FIRST_ORDERED_NODE_TYPE, null).singleNodeValue;
      } catch (e) { return null; }
    }
    try { return document.querySelector(sel); } catch (e) { return null; }
  }
  function __resolveAll(sel) {
    var out = [];
    if (sel.charAt(0) === '/' || sel.charAt(0) === '(') {
      try {
        var snap = document.evaluate(sel, document, null, XPathResult.ORDERED_NODE_SNAPSHOT_TYPE, null);
        for (var i = 0; i < snap.snapshotLength; i++) out.push(snap.snapshotItem(i));
      } catch (e) {}
      return out;
    }
    try { return Array.prototype.slice.call(document.querySelectorAll(sel)); } catch (e) { return out; }
  }
  function __xpath(el) {
    if (el.id && document.querySelectorAll('#' + CSS.escape(el.id)).length === 1) {
      return '//*[@id="' + el.id + '"]';
    }
    var steps = [];
    var node = el;
    while (node && node.nodeType === 1 && node !== document.documentElement) {
      var tag = node.tagName.toLowerCase();
      var idx = 1;
      var sib = node.previousElementSibling;
      while (sib) { if (sib.tagName === node.tagName) idx++; sib = sib.previousElementSibling; }
      steps.unshift(tag + '[' + idx + ']');
      node = node.parentElement;
    }
    return '/html/' + steps.join('/');
  }
  function __structuralXpath(el) {
    var steps = [];
    var node = el;
    while (node && node.nodeType === 1 && node !== document.documentElement) {
      var tag = node.tagName.toLowerCase();
      var idx = 1;
      var sib = node.previousElementSibling;
      while (sib) { if (sib.tagName === node.tagName) idx++; sib = sib.previousElementSibling; }
      steps.unshift(tag + '[' + idx + ']');
      node = node.parentElement;
    }
    return '/html/' + steps.join('/');
  }
  function __text(el) {
    return ((el && (el.innerText || el.textContent)) || '').replace(/\\s+/g, ' ').trim();
  }
  function __visible(el) {
    var r = el.getBoundingClientRect();
    if (r.width <= 0 || r.height <= 0) return false;
    var s = window.getComputedStyle(el);
    return s.display !== 'none' && s.visibility !== 'hidden';
  }
  function __loading() {
    if (document.readyState !== 'complete') return true;
    var marks = document.querySelectorAll(${args(LOADING_SELECTOR)});
    for (var i = 0; i < marks.length; i++) { if (__visible(marks[i])) return true; }
    return false;
  }
  function __isControl(el) {
    var tag = el.tagName.toLowerCase();
    if (tag !== 'input') return true;
    var type = (el.getAttribute('type') || 'text').toLowerCase();
    return ${args(EXCLUDED_INPUT_TYPES)}.indexOf(type) === -1;
  }
  function __headerFor(cell) {
    var table = cell.closest('table');
    if (!table) return '';
    var heads = table.querySelectorAll('thead th');
    if (!heads.length) heads = table.querySelectorAll('tr:first-child th');
    var h = heads[cell.cellIndex];
    return h ? __text(h) : '';
  }
`;

// ── Scan ──────────────────────────────────────────────────────────────

export function snapshotScript(): string {
  return `
    (() => {
      ${HELPERS}
      if (__loading()) return { status: 'loading' };

      function labelOf(el) {
        if (el.id) {
          var byFor = document.querySelector('label[for="' + CSS.escape(el.id) + '"]');
          if (byFor) return __text(byFor);
        }
        var wrap = el.closest('label');
        if (wrap) return __text(wrap);
        var cell = el.closest('td');
        if (cell) return __headerFor(cell);
        return '';
      }
      function formLabelOf(el) {
        var item = el.closest('.el-form-item, .ant-form-item, .form-group');
        if (!item) return '';
        var lab = item.querySelector('.el-form-item__label, .ant-form-item-label, label');
        return lab ? __text(lab) : '';
      }
      function nearbyOf(el) {
        var prev = el.previousElementSibling;
        var t = prev ? __text(prev) : '';
        if (!t && el.parentElement && el.parentElement.previousElementSibling) {
          t = __text(el.parentElement.previousElementSibling);
        }
        return t.length > 40 ? t.slice(0, 40) : t;
      }

      var nodes = document.querySelectorAll(${args(CONTROL_SELECTOR)});
      var elements = [];
      var byName = {};
      for (var i = 0; i < nodes.length; i++) {
        var el = nodes[i];
        if (!__isControl(el) || !__visible(el)) continue;

        var tag = el.tagName.toLowerCase();
        var type = (el.getAttribute('type') || '').toLowerCase();
        var name = el.getAttribute('name') || '';
        var classes = (el.getAttribute('class') || '').split(/\\s+/).filter(Boolean);
        var label = labelOf(el);
        var ariaLabel = el.getAttribute('aria-label') || '';
        var selectors = [];
        if (el.id) selectors.push({ kind: 'id', value: '#' + CSS.escape(el.id) });
        selectors.push({ kind: 'xpath', value: __structuralXpath(el) });
        if (classes.length) selectors.push({ kind: 'css', value: tag + '.' + classes.slice(0, 2).map(CSS.escape).join('.') });
        if (ariaLabel) selectors.push({ kind: 'aria', value: tag + '[aria-label="' + ariaLabel.replace(/"/g, '\\\\"') + '"]' });
        if (label && label.indexOf('"') === -1) {
          selectors.push({ kind: 'text', value: '//label[normalize-space()="' + label + '"]/following::' + tag + '[1]' });
        }

        var table = null;
        var cell = el.closest('td');
        var tr = el.closest('tr');
        if (cell && tr) {
          var tbl = tr.closest('table');
          var rows = tr.parentElement ? tr.parentElement.querySelectorAll(':scope > tr') : [];
          table = {
            rowIndex: Array.prototype.indexOf.call(rows, tr),
            columnIndex: cell.cellIndex,
            tableId: (tbl && tbl.id) || '',
            columnHeader: __headerFor(cell),
          };
        }

        var r = el.getBoundingClientRect();
        var raw = {
          tag: tag,
          type: type,
          id: el.id || '',
          name: name,
          classes: classes,
          selectors: selectors,
          anchors: {
            label: label,
            placeholder: el.getAttribute('placeholder') || '',
            ariaLabel: ariaLabel,
            nearbyText: nearbyOf(el),
            formLabel: formLabelOf(el),
          },
          box: { x: Math.round(r.x), y: Math.round(r.y), width: Math.round(r.width), height: Math.round(r.height) },
          table: table,
          siblings: [],
        };

        // Repeated controls sharing a name outside a table fold into one group field.
        if (name && !table && byName[name]) {
          byName[name].siblings.push(__structuralXpath(el));
          continue;
        }
        if (name && !table) byName[name] = raw;
        elements.push(raw);
      }
      return { status: 'ready', elements: elements };
    })()
  `;
}

export function listFramesScript(): string {
  return `
    (() => {
      var frames = document.querySelectorAll('iframe, frame');
      var out = [];
      for (var i = 0; i < frames.length; i++) {
        var r = frames[i].getBoundingClientRect();
        out.push({ index: i, src: frames[i].getAttribute('src') || '', width: r.width, height: r.height });
      }
      return out;
    })()
  `;
}

export function fallbackScanScript(): string {
  return `
    (() => {
      ${HELPERS}
      var nodes = document.querySelectorAll('input, select, textarea');
      var out = [];
      for (var i = 0; i < nodes.length; i++) {
        var el = nodes[i];
        if (!__isControl(el)) continue;
        var tag = el.tagName.toLowerCase();
        var label = '';
        var cell = el.closest('td');
        if (cell) label = __headerFor(cell);
        if (!label && el.id) {
          var lab = document.querySelector('label[for="' + CSS.escape(el.id) + '"]');
          if (lab) label = __text(lab);
        }
        if (!label) label = el.getAttribute('placeholder') || el.getAttribute('name') || el.id || '';
        var selectors = [];
        if (el.id) selectors.push({ kind: 'id', value: '#' + CSS.escape(el.id) });
        selectors.push({ kind: 'xpath', value: __structuralXpath(el) });
        var r = el.getBoundingClientRect();
        out.push({
          tag: tag,
          type: (el.getAttribute('type') || '').toLowerCase(),
          id: el.id || '',
          name: el.getAttribute('name') || '',
          classes: [],
          selectors: selectors,
          anchors: { label: label, placeholder: el.getAttribute('placeholder') || '', ariaLabel: '', nearbyText: '', formLabel: '' },
          box: { x: r.x, y: r.y, width: r.width, height: r.height },
          table: null,
          siblings: [],
        });
      }
      return out;
    })()
  `;
}

// ── Table and page state ─────────────────────────────────────────────

export function countRowsScript(): string {
  return `
    (() => {
      var body = document.querySelectorAll('table tbody tr');
      if (body.length) return body.length;
      var all = document.querySelectorAll('table tr');
      if (all.length) {
        var header = document.querySelector('table tr th') ? 1 : 0;
        return Math.max(0, all.length - header);
      }
      return document.querySelectorAll('.el-table__row').length;
    })()
  `;
}

export function isLoadingScript(): string {
  return `(() => { ${HELPERS} return __loading(); })()`;
}

export function readCellsScript(selector: string): string {
  return `
    (() => {
      ${HELPERS}
      var nodes = __resolveAll(${args(selector)});
      return nodes.map(function (n) {
        var tag = n.tagName ? n.tagName.toLowerCase() : '';
        if (tag === 'input' || tag === 'textarea' || tag === 'select') return String(n.value || '').trim();
        var inner = n.querySelector ? n.querySelector('input, textarea, select') : null;
        var text = __text(n);
        return text || (inner ? String(inner.value || '').trim() : '');
      });
    })()
  `;
}

export function pageSignatureScript(): string {
  return `
    (() => {
      ${HELPERS}
      function first(selectors) {
        for (var i = 0; i < selectors.length; i++) {
          var el = document.querySelector(selectors[i]);
          var t = el ? __text(el) : '';
          if (t) return t;
        }
        return null;
      }
      var input = document.querySelector('table tbody input');
      return {
        url: location.href,
        indicator: first(${args(INDICATOR_SELECTORS)}),
        firstRowText: first(${args(FIRST_ROW_SELECTORS)}),
        firstInputValue: input && input.value ? String(input.value) : null,
        controlCount: document.querySelectorAll(${args(CONTROL_SELECTOR)}).length,
      };
    })()
  `;
}

export function inspectControlScript(selector: string): string {
  return `
    (() => {
      ${HELPERS}
      var el = __resolve(${args(selector)});
      if (!el) return { exists: false, disabledAttr: null, ariaDisabled: null, classTokens: [], pointerEvents: 'auto', opacity: 1 };
      var s = window.getComputedStyle(el);
      return {
        exists: true,
        disabledAttr: el.getAttribute('disabled'),
        ariaDisabled: el.getAttribute('aria-disabled'),
        classTokens: (el.getAttribute('class') || '').split(/\\s+/).filter(Boolean),
        pointerEvents: s.pointerEvents || 'auto',
        opacity: parseFloat(s.opacity || '1'),
      };
    })()
  `;
}

export function paginationCandidatesScript(): string {
  return `
    (() => {
      ${HELPERS}
      var pattern = /^(下一页|下页|next( page)?|›|»|>)$/i;
      var nodes = document.querySelectorAll('button, a, li, span, [role="button"]');
      var out = [];
      for (var i = 0; i < nodes.length; i++) {
        var el = nodes[i];
        if (!__visible(el)) continue;
        var text = __text(el);
        var cls = (el.getAttribute('class') || '').toLowerCase();
        var aria = el.getAttribute('aria-label') || '';
        if (pattern.test(text) || pattern.test(aria) || /(^|[\\s_-])(btn-)?next([\\s_-]|$)/.test(cls)) {
          out.push({ text: text || aria || cls, selector: __xpath(el) });
        }
      }
      return out;
    })()
  `;
}

// ── Self-healing ─────────────────────────────────────────────────────

export function locateByTextScript(texts: readonly string[], limit: number): string {
  return `
    (() => {
      ${HELPERS}
      var wanted = ${args(texts.map((t) => t.trim().toLowerCase()))};
      var limit = ${args(limit)};
      var holders = document.querySelectorAll('label, span, td, th, div, p, strong');
      var found = [];
      for (var i = 0; i < holders.length && found.length < 50; i++) {
        var h = holders[i];
        if (h.children.length > 3) continue;
        var t = __text(h).toLowerCase();
        if (!t || t.length > 60) continue;
        var hit = false;
        for (var w = 0; w < wanted.length; w++) { if (wanted[w] && t.indexOf(wanted[w]) !== -1) { hit = true; break; } }
        if (hit) found.push(h);
      }
      var scored = [];
      var seen = {};
      for (var j = 0; j < found.length; j++) {
        var anchor = found[j].getBoundingClientRect();
        var scope = found[j].parentElement;
        for (var up = 0; up < 3 && scope; up++) {
          var controls = scope.querySelectorAll(${args(CONTROL_SELECTOR)});
          for (var k = 0; k < controls.length; k++) {
            var c = controls[k];
            if (!__isControl(c) || !__visible(c)) continue;
            var xp = __xpath(c);
            if (seen[xp]) continue;
            seen[xp] = true;
            var r = c.getBoundingClientRect();
            var d = Math.abs(r.left - anchor.right) + Math.abs(r.top - anchor.top);
            scored.push({ selector: xp, distance: d });
          }
          if (controls.length) break;
          scope = scope.parentElement;
        }
      }
      scored.sort(function (a, b) { return a.distance - b.distance; });
      return scored.slice(0, limit).map(function (s) { return s.selector; });
    })()
  `;
}

// ── Writes ───────────────────────────────────────────────────────────

/**
 * Value assignment with the event sequence reactive front ends listen for:
 * focus, clear, type-aware assignment, input, change, blur.
 */
export function writeValueScript(selector: string, value: string, kind: ControlKind): string {
  return `
    (() => {
      ${HELPERS}
      var el = __resolve(${args(selector)});
      var value = ${args(value)};
      var kind = ${args(kind)};
      if (!el) return { ok: false, reason: 'not found' };
      if (el.disabled) return { ok: false, reason: 'disabled' };

      function fire(type) {
        var ev = type === 'input'
          ? new InputEvent('input', { bubbles: true, data: value, inputType: 'insertText' })
          : new Event(type, { bubbles: true });
        el.dispatchEvent(ev);
      }
      function setNative(v) {
        var proto = el.tagName === 'TEXTAREA' ? HTMLTextAreaElement.prototype : HTMLInputElement.prototype;
        var desc = Object.getOwnPropertyDescriptor(proto, 'value');
        if (desc && desc.set && (el.tagName === 'INPUT' || el.tagName === 'TEXTAREA')) desc.set.call(el, v);
        else if (el.isContentEditable) el.textContent = v;
        else el.value = v;
      }

      el.focus();
      el.dispatchEvent(new FocusEvent('focusin', { bubbles: true }));

      if (kind === 'choice' && el.tagName === 'SELECT') {
        var opts = el.options;
        var pick = -1;
        for (var i = 0; i < opts.length; i++) {
          if (opts[i].value === value || opts[i].text.trim() === value) { pick = i; break; }
        }
        if (pick === -1) {
          for (var j = 0; j < opts.length; j++) {
            if (opts[j].text.indexOf(value) !== -1 || opts[j].value.indexOf(value) !== -1) { pick = j; break; }
          }
        }
        if (pick === -1) return { ok: false, reason: 'no option matches' };
        el.selectedIndex = pick;
      } else if (kind === 'toggle') {
        var want = ['true', '1', 'yes', 'y', '是', 'on', 'checked'].indexOf(value.toLowerCase()) !== -1;
        if (el.checked !== want) el.click();
      } else {
        setNative('');
        setNative(value);
      }

      fire('input');
      fire('change');
      el.blur();
      el.dispatchEvent(new FocusEvent('focusout', { bubbles: true }));

      if (kind === 'text' && !el.isContentEditable && String(el.value) !== value) {
        return { ok: false, reason: 'value not accepted' };
      }
      return { ok: true };
    })()
  `;
}

export function highlightScript(selector: string): string {
  return `
    (() => {
      ${HELPERS}
      var el = __resolve(${args(selector)});
      if (!el) return false;
      el.scrollIntoView({ block: 'center' });
      var prev = el.style.outline;
      el.style.outline = '3px solid #f5a623';
      setTimeout(function () { el.style.outline = prev; }, 2000);
      return true;
    })()
  `;
}
