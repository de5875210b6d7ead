/**
 * DOM Collector
 *
 * Extracts the structured data each comparison category needs by running
 * scripts in the page through Driver.executeScript. Collection failures
 * propagate to the caller; the engine counts them as errors.
 */

import type {
  AccessibilityCounts,
  AccordionState,
  Driver,
  FormSummary,
  I18nInfo,
  IframeReport,
  ImagePreview,
  LinkEntry,
  CountProfile,
  ItemCounts,
  ListStructure,
  MetaTags,
  OrderedPage,
  OrderedTexts,
  PageArchitecture,
  PaginationState,
  PerformanceTimings,
  RolePair,
  TablePreview,
  TabState,
  ThemePalette,
  WidgetTexts,
} from './types.js';
import type { CollectionContext } from './collection-context.js';
import { silentLogger, type Logger } from './logger.js';

const BUTTON_SELECTOR = `button, a[role='button'], input[type='button'], input[type='submit'], [role='button']`;

const NAV_LIST_SELECTOR = [
  'nav ul', 'nav ol', '.nav ul', '.nav ol', '.navigation ul', '.navigation ol',
  '.menu ul', '.menu ol', '.navbar ul', '.navbar ol', "[role='navigation'] ul", "[role='navigation'] ol",
].join(', ');
const BREADCRUMB_SELECTOR = [
  '.breadcrumb', '.breadcrumbs', '.breadcrumb-nav', '.breadcrumb-list', '.breadcrumb-menu',
  "[role='navigation'][aria-label*='breadcrumb']", "nav[aria-label*='breadcrumb']", "nav[aria-label*='Breadcrumb']",
].join(', ');
const FEATURE_LIST_SELECTOR = [
  '.features ul', '.features ol', '.benefits ul', '.benefits ol', '.product-features ul', '.product-features ol',
  '.feature-list', '.benefit-list', '.specs ul', '.specs ol', '.highlights ul', '.highlights ol',
].join(', ');
const CAROUSEL_SELECTOR = `.carousel, .slider, [role='region'][aria-label*='carousel'], [role='region'][aria-label*='slider']`;
const SOCIAL_PLATFORMS = ['facebook', 'twitter', 'linkedin', 'instagram', 'youtube', 'github'];
const THEME_SELECTOR = 'body, header, footer, main, .header, .footer, .main, .button, .link';

/** Helpers shared by every script. Pages without innerText fall back to textContent. */
const PRELUDE = `
  var textOf = function (el) {
    if (!el) return '';
    var raw = typeof el.innerText === 'string' ? el.innerText : el.textContent;
    return (raw || '').replace(/\\s+/g, ' ').trim();
  };
  var isVisible = function (el) {
    if (el.closest('[hidden]')) return false;
    var view = el.ownerDocument.defaultView || window;
    for (var node = el; node && node.nodeType === 1; node = node.parentElement) {
      var style = view.getComputedStyle(node);
      if (style.display === 'none' || style.visibility === 'hidden') return false;
    }
    return true;
  };
  var pathOf = function (href) {
    if (!href) return '';
    try {
      var url = new URL(href, location.href);
      return (url.pathname || '/') + url.search;
    } catch (e) {
      return href;
    }
  };
  var buttonText = function (el) {
    return textOf(el) || (el.value || '').trim() || (el.getAttribute('aria-label') || '').trim();
  };
  var all = function (root, selector) {
    return Array.from(root.querySelectorAll(selector));
  };
  var count = function (selector) { return document.querySelectorAll(selector).length; };
  var counts = function (selectors) {
    var out = {};
    Object.keys(selectors).forEach(function (key) { out[key] = count(selectors[key]); });
    return out;
  };
  var itemCounts = function (selector, itemSelector) {
    return all(document, selector).map(function (el) { return el.querySelectorAll(itemSelector).length; });
  };
`;

function script(body: string): string {
  return `${PRELUDE}\n${body}`;
}

const SCRIPTS = {
  title: script(`return (document.title || '').trim();`),

  primaryH1: script(`return textOf(document.querySelector('h1'));`),

  headings: script(`return all(document, 'h1,h2,h3,h4,h5,h6').map(textOf).filter(Boolean);`),

  navLinks: script(`return all(document, "nav a, [role='navigation'] a").map(textOf).filter(Boolean);`),

  buttons: script(`
    return all(document, ${JSON.stringify(BUTTON_SELECTOR)})
      .filter(function (el) { return isVisible(el) && !el.hasAttribute('disabled'); })
      .map(buttonText)
      .filter(Boolean);
  `),

  bodyText: script(`
    return textOf(document.body).slice(0, arguments[0]);
  `),

  links: script(`
    return all(document, 'a[href]')
      .filter(isVisible)
      .map(function (a) { return [textOf(a) || (a.getAttribute('aria-label') || '').trim(), pathOf(a.getAttribute('href'))]; })
      .filter(function (pair) { return pair[0].length > 0; });
  `),

  formSummary: script(`
    var labelFor = function (el) {
      if (el.id) {
        var byFor = all(document, 'label').filter(function (l) { return l.getAttribute('for') === el.id; })[0];
        if (byFor) return textOf(byFor);
      }
      return textOf(el.closest('label'));
    };
    return {
      inputs: all(document, 'input,select,textarea')
        .filter(function (el) { return el.type !== 'hidden'; })
        .map(function (el) {
          return {
            name: el.getAttribute('name') || '',
            type: (el.getAttribute('type') || el.tagName).toLowerCase(),
            label: labelFor(el),
            required: el.hasAttribute('required'),
            placeholder: el.getAttribute('placeholder') || ''
          };
        })
    };
  `),

  tablePreview: script(`
    var table = document.querySelector('table');
    if (!table) return { headers: [], rows: [] };
    var headers = all(table, 'thead th').map(textOf);
    if (headers.length === 0) headers = all(table, 'tr th').map(textOf);
    var bodyRows = all(table, 'tbody tr').filter(function (tr) { return tr.querySelector('td'); });
    var rows = bodyRows.slice(0, arguments[0]).map(function (tr) { return all(tr, 'td').map(textOf); });
    return { headers: headers, rows: rows };
  `),

  meta: script(`
    var attr = function (selector, name) {
      var el = document.querySelector(selector);
      return el ? (el.getAttribute(name) || '') : '';
    };
    return {
      title: document.title || '',
      description: attr('meta[name="description"]', 'content'),
      robots: attr('meta[name="robots"]', 'content'),
      canonical: attr('link[rel="canonical"]', 'href'),
      og_title: attr('meta[property="og:title"]', 'content'),
      og_description: attr('meta[property="og:description"]', 'content')
    };
  `),

  accessibility: script(`
    var imagesMissingAlt = all(document, 'img').filter(function (img) {
      return !img.hasAttribute('alt') || img.getAttribute('alt').trim().length === 0;
    }).length;
    var buttonsWithoutName = all(document, 'button,[role="button"]').filter(function (b) {
      return (textOf(b) || (b.getAttribute('aria-label') || '').trim()).length === 0;
    }).length;
    var inputsWithoutLabel = all(document, 'input:not([type=hidden]):not([type=submit]):not([type=button]),select,textarea')
      .filter(function (el) {
        var labelled = el.closest('label') || (el.id && all(document, 'label').some(function (l) { return l.getAttribute('for') === el.id; }));
        return !labelled && !(el.getAttribute('aria-label') || '').trim() && !el.getAttribute('aria-labelledby');
      }).length;
    return {
      images_missing_alt: imagesMissingAlt,
      buttons_without_name: buttonsWithoutName,
      inputs_without_label: inputsWithoutLabel
    };
  `),

  breadcrumbs: script(`
    var areas = all(document, 'nav[aria-label="breadcrumb"], .breadcrumb');
    var items = [];
    areas.forEach(function (area) {
      var links = all(area, 'a');
      if (links.length) {
        links.forEach(function (a) { items.push(textOf(a)); });
      } else {
        all(area, 'li').forEach(function (li) { items.push(textOf(li)); });
      }
    });
    return items.filter(Boolean);
  `),

  tabs: script(`
    return all(document, '[role="tab"]').map(function (el) {
      return { label: textOf(el), selected: el.getAttribute('aria-selected') === 'true' };
    });
  `),

  accordions: script(`
    return all(document, '[aria-expanded]').filter(function (el) { return el.getAttribute('role') !== 'tab'; })
      .map(function (el) {
        return { text: textOf(el), expanded: el.getAttribute('aria-expanded') === 'true' };
      });
  `),

  pagination: String.raw`${PRELUDE}
    var nav = document.querySelector('nav[aria-label="pagination"], .pagination');
    if (!nav) return { current: '', total: '', has_next: false, has_prev: false };
    var current = textOf(nav.querySelector('.active, [aria-current="page"]'));
    var numbers = all(nav, 'a,button').map(textOf).filter(function (t) { return /^\d+$/.test(t); });
    return {
      current: current,
      total: numbers.length ? numbers[numbers.length - 1] : '',
      has_next: !!nav.querySelector('.next:not(.disabled), [aria-label="Next"]:not([disabled])'),
      has_prev: !!nav.querySelector('.prev:not(.disabled), [aria-label="Previous"]:not([disabled])')
    };
  `,

  widgets: script(`
    var texts = function (selector) { return all(document, selector).map(textOf).filter(Boolean); };
    return {
      toasts: texts('.toast, .snackbar, [role="status"]'),
      dialogs: texts('[role="dialog"], .modal'),
      tooltips: texts('[role="tooltip"], .tooltip')
    };
  `),

  images: script(`
    return all(document, 'img').slice(0, arguments[0]).map(function (img) {
      return { alt: (img.getAttribute('alt') || '').trim(), loading: img.getAttribute('loading') || '' };
    });
  `),

  landmarks: script(`
    return {
      header: !!document.querySelector('header, [role="banner"]'),
      main: !!document.querySelector('main, [role="main"]'),
      nav: !!document.querySelector('nav, [role="navigation"]'),
      footer: !!document.querySelector('footer, [role="contentinfo"]')
    };
  `),

  interactiveRoles: script(`
    return all(document, 'a,button,[role="button"],input,select,textarea')
      .map(function (el) {
        var name = (el.getAttribute('aria-label') || '').trim() || textOf(el);
        return [(el.getAttribute('role') || el.tagName).toLowerCase(), name];
      })
      .filter(function (pair) { return pair[1].length > 0; })
      .slice(0, arguments[0]);
  `),

  i18n: script(`
    var root = document.documentElement;
    return { lang: (root.getAttribute('lang') || '').toLowerCase(), dir: (root.getAttribute('dir') || '').toLowerCase() };
  `),

  performance: script(`
    var entries = typeof performance.getEntriesByType === 'function' ? performance.getEntriesByType('navigation') : [];
    var nav = entries[0];
    if (!nav) return { domContentLoaded: 0, loadEventEnd: 0 };
    return { domContentLoaded: nav.domContentLoadedEventEnd || 0, loadEventEnd: nav.loadEventEnd || 0 };
  `),

  listStructure: script(`
    var summary = { total_ul: 0, total_ol: 0, total_li: 0, total_nested_lists: 0 };
    var lists = all(document, 'ul, ol').map(function (list) {
      var type = list.tagName.toLowerCase();
      var items = Array.from(list.children).filter(function (child) { return child.tagName === 'LI'; });
      if (type === 'ul') summary.total_ul++;
      else summary.total_ol++;
      summary.total_li += items.length;
      if (items.some(function (li) { return li.querySelector('ul, ol'); })) summary.total_nested_lists++;
      return { type: type, items: items.length };
    });
    return { summary: summary, lists: lists };
  `),

  pageArchitecture: script(`
    var s = {
      total_elements: count('*'),
      divs: count('div'),
      spans: count('span'),
      paragraphs: count('p'),
      sections: count('section'),
      articles: count('article'),
      asides: count('aside'),
      lists: count('ul, ol'),
      list_items: count('li'),
      forms: count('form'),
      tables: count('table'),
      images: count('img'),
      links: count('a'),
      buttons: count('button'),
      inputs: count('input'),
      selects: count('select'),
      textareas: count('textarea'),
      iframes: count('iframe'),
      scripts: count('script'),
      styles: count('style, link[rel="stylesheet"]'),
      meta_tags: count('meta'),
      title_tags: count('title'),
      headings: count('h1, h2, h3, h4, h5, h6'),
      landmarks: count('header, nav, main, aside, footer, [role="banner"], [role="navigation"], [role="main"], [role="complementary"], [role="contentinfo"]')
    };
    var height = document.body ? document.body.scrollHeight : 0;
    s.element_density = s.total_elements / Math.max(height, 1);
    s.semantic_ratio = s.landmarks / Math.max(s.divs, 1);
    s.interactive_ratio = (s.buttons + s.inputs + s.links) / Math.max(s.total_elements, 1);
    return s;
  `),

  navigationLists: script(`return itemCounts(${JSON.stringify(NAV_LIST_SELECTOR)}, 'li');`),

  breadcrumbLists: script(`
    var areas = all(document, ${JSON.stringify(BREADCRUMB_SELECTOR)});
    return areas
      .filter(function (area) {
        return !areas.some(function (other) { return other !== area && other.contains(area); });
      })
      .map(function (area) {
        return area.querySelectorAll('li').length || area.querySelectorAll('a').length;
      });
  `),

  featureLists: script(`return itemCounts(${JSON.stringify(FEATURE_LIST_SELECTOR)}, 'li');`),

  semanticContent: script(`
    return counts({
      emphasis_elements: 'em, strong, mark',
      code_elements: 'code, pre, kbd, samp, var',
      quotations: 'blockquote, cite',
      definitions: 'dfn, abbr, acronym',
      time_elements: 'time',
      interactive_elements: 'details, dialog, menu',
      form_structure: 'fieldset, legend, optgroup, datalist',
      progress_indicators: 'progress, meter, output',
      graphics_elements: 'canvas, svg, object, embed'
    });
  `),

  semanticElements: script(`
    var texts = function (selector, read) {
      return all(document, selector).map(read || textOf).filter(Boolean);
    };
    return {
      emphasis: texts('em, strong, mark'),
      code_elements: texts('code, pre, kbd, samp, var'),
      quotations: texts('blockquote, cite'),
      definitions: texts('dfn, acronym'),
      time_elements: texts('time', function (el) { return el.getAttribute('datetime') || textOf(el); }),
      abbreviations: texts('abbr', function (el) { return el.getAttribute('title') || textOf(el); }),
      content_changes: texts('del, ins, s')
    };
  `),

  interactiveElements: script(`
    return counts({
      details: 'details',
      open_details: 'details[open]',
      dialogs: 'dialog',
      open_dialogs: 'dialog[open]',
      menus: 'menu',
      menu_items: 'menu li, menu menuitem'
    });
  `),

  formStructure: script(`
    return counts({
      fieldsets: 'fieldset',
      legends: 'legend',
      option_groups: 'optgroup',
      options: 'option',
      datalists: 'datalist'
    });
  `),

  formDetails: script(`
    return counts({
      inputs: 'input:not([type="hidden"]), select, textarea',
      required: '[required]',
      constrained: '[pattern], [min], [max], [minlength], [maxlength]',
      select_options: 'select option',
      checked: 'input:checked',
      disabled: 'input:disabled, select:disabled, textarea:disabled, button:disabled',
      validation_messages: '[role="alert"], .error, .mat-error'
    });
  `),

  progressIndicators: script(`
    return counts({ progress_bars: 'progress, [role="progressbar"]', meters: 'meter', outputs: 'output' });
  `),

  graphicsElements: script(`
    return counts({
      canvas_elements: 'canvas',
      svg_elements: 'svg',
      svg_shapes: 'svg path, svg circle, svg rect',
      embedded_objects: 'object, embed'
    });
  `),

  carousels: script(`return itemCounts(${JSON.stringify(CAROUSEL_SELECTOR)}, '.slide, .carousel-item, [role="tabpanel"]');`),

  search: script(`
    return counts({
      search_inputs: 'input[type="search"], input[name*="search"], input[placeholder*="search"], input[placeholder*="Search"], .search-input',
      search_buttons: '.search-button, [aria-label*="search"], [aria-label*="Search"]',
      search_forms: 'form[action*="search"], form[class*="search"], [role="search"]',
      autocomplete: 'input[list], [role="combobox"]'
    });
  `),

  notifications: script(`
    return counts({
      alerts: '[role="alert"], .alert',
      status: '[role="status"]',
      toasts: '.toast, .snackbar',
      messages: '.notification, .message'
    });
  `),

  loadingStates: script(`
    return counts({
      spinners: '.spinner, .loading, .loader, .progress',
      skeletons: '.skeleton, .shimmer, [class*="skeleton"], [class*="shimmer"]',
      overlays: '.loading-overlay, .spinner-overlay',
      aria_busy: '[aria-busy="true"]'
    });
  `),

  socialMedia: script(`
    var out = {};
    ${JSON.stringify(SOCIAL_PLATFORMS)}.forEach(function (platform) {
      out[platform] = count('a[href*="' + platform + '"]');
    });
    out.share = count('.share, .social-share, [aria-label*="share"], [aria-label*="Share"], [title*="share"]');
    return out;
  `),

  mediaElements: script(`
    return counts({
      videos: 'video',
      embedded_videos: 'iframe[src*="youtube"], iframe[src*="vimeo"], iframe[src*="dailymotion"]',
      audios: 'audio',
      players: '.video-player, .audio-player, .media-player',
      with_controls: 'video[controls], audio[controls]'
    });
  `),

  dataAttributes: script(`
    var out = {};
    all(document, '*').forEach(function (el) {
      Array.from(el.attributes).forEach(function (attr) {
        if (attr.name.indexOf('data-') === 0) out[attr.name] = (out[attr.name] || 0) + 1;
      });
    });
    return out;
  `),

  customElements: script(`
    var names = {};
    all(document, '*').forEach(function (el) {
      var tag = el.tagName.toLowerCase();
      if (tag.indexOf('-') !== -1) names[tag] = true;
    });
    return Object.keys(names).sort();
  `),

  analytics: script(`
    var has = function (selector) { return !!document.querySelector(selector); };
    var layer = window.dataLayer;
    return {
      google_analytics: has('script[src*="google-analytics"], script[src*="gtag"], script[src*="ga.js"]'),
      google_tag_manager: has('script[src*="googletagmanager"], #gtm, [data-gtm]'),
      facebook_pixel: has('script[src*="facebook"], [data-pixel]'),
      hotjar: has('script[src*="hotjar"], [data-hotjar]'),
      intercom: has('script[src*="intercom"], #intercom-container'),
      segment: has('script[src*="segment"], [data-segment]'),
      custom_tracking: has('script[src*="analytics"], script[src*="tracking"]'),
      data_layer: !!layer,
      gtm_data_layer: !!layer && layer.length > 0,
      tracking_attributes: has('[data-tracking], [data-analytics], [data-event], [onclick*="track"], [onclick*="analytics"]')
    };
  `),

  errorStates: script(`
    return counts({
      alerts: '[role="alert"]',
      error_messages: '.error, .error-message, .validation-error, .field-error',
      invalid_fields: '.invalid, [aria-invalid="true"]'
    });
  `),

  themeColors: script(`
    var view = document.defaultView || window;
    var clear = function (value) { return !value || value === 'transparent' || value === 'rgba(0, 0, 0, 0)'; };
    var distinct = function (values) {
      return values.filter(function (v, i) { return !clear(v) && values.indexOf(v) === i; });
    };
    var styles = all(document, ${JSON.stringify(THEME_SELECTOR)}).map(function (el) { return view.getComputedStyle(el); });
    var accents = all(document, '.accent, a, button').map(function (el) { return view.getComputedStyle(el).color; });
    var rootStyle = view.getComputedStyle(document.documentElement);
    var variables = [];
    for (var i = 0; i < rootStyle.length; i++) {
      var prop = rootStyle[i];
      if (prop.indexOf('--') === 0) variables.push(prop + ': ' + rootStyle.getPropertyValue(prop).trim());
    }
    return {
      background_colors: distinct(styles.map(function (s) { return s.backgroundColor; })),
      text_colors: distinct(styles.map(function (s) { return s.color; })),
      accent_colors: distinct(accents),
      css_variables: distinct(variables)
    };
  `),

  orderedPage: script(`
    var limit = arguments[0];
    var kinds = {
      headings: ['h1,h2,h3,h4,h5,h6', textOf],
      buttons: [${JSON.stringify(BUTTON_SELECTOR)}, function (el) {
        return isVisible(el) && !el.hasAttribute('disabled') ? buttonText(el) : '';
      }],
      links: ['a[href]', function (el) {
        return isVisible(el) ? textOf(el) || (el.getAttribute('aria-label') || '').trim() : '';
      }],
      nav_links: ["nav a, [role='navigation'] a", textOf],
      form_elements: ['input, select, textarea', function (el) {
        return (el.getAttribute('placeholder') || el.getAttribute('name') || el.id || '').trim();
      }],
      images: ['img', function (el) { return (el.getAttribute('alt') || el.getAttribute('title') || '').trim(); }],
      tables: ['table', textOf],
      lists: ['ul, ol', textOf],
      paragraphs: ['p', textOf],
      divs: ['div[class], div[id]', textOf]
    };
    var elements = {};
    Object.keys(kinds).forEach(function (kind) {
      elements[kind] = all(document, kinds[kind][0])
        .map(function (el) { return kinds[kind][1](el).slice(0, limit); })
        .filter(Boolean);
    });
    return { title: (document.title || '').trim(), elements: elements };
  `),

  iframes: script(`
    var content = function (doc) {
      return {
        title: (doc.title || '').trim(),
        headings: all(doc, 'h1,h2,h3,h4,h5,h6').map(textOf).filter(Boolean),
        buttons: all(doc, ${JSON.stringify(BUTTON_SELECTOR)}).map(buttonText).filter(Boolean),
        links: all(doc, 'a[href]')
          .map(function (a) { return [textOf(a), pathOf(a.getAttribute('href'))]; })
          .filter(function (pair) { return pair[0].length > 0; })
      };
    };
    var frames = all(document, 'iframe, frame').map(function (frame, index) {
      var doc = null;
      try {
        doc = frame.contentDocument;
      } catch (e) {
        doc = null;
      }
      return { index: index, src: frame.getAttribute('src') || '', accessible: !!doc, content: doc ? content(doc) : null };
    });
    var accessible = frames.filter(function (f) { return f.accessible; });
    var totalElements = accessible.reduce(function (sum, f) {
      return sum + f.content.headings.length + f.content.buttons.length + f.content.links.length;
    }, 0);
    return {
      main: content(document),
      frames: frames,
      summary: { total_iframes: frames.length, accessible_iframes: accessible.length, total_elements: totalElements }
    };
  `),

  removeIgnored: `
    var removed = 0;
    arguments[0].forEach(function (selector) {
      document.querySelectorAll(selector).forEach(function (el) { el.remove(); removed++; });
    });
    return removed;
  `,
} as const;

export interface DomCollectorOptions {
  bodyTextLimit?: number;
  /** Each ordered element text is cut to this many characters. */
  orderedTextLimit?: number;
  tableRowLimit?: number;
  imageLimit?: number;
  roleLimit?: number;
  logger?: Logger;
}

export class DomCollector {
  private options: Required<Omit<DomCollectorOptions, 'logger'>>;
  private logger: Logger;

  constructor(options: DomCollectorOptions = {}) {
    this.options = {
      bodyTextLimit: options.bodyTextLimit ?? 2000,
      orderedTextLimit: options.orderedTextLimit ?? 50,
      tableRowLimit: options.tableRowLimit ?? 5,
      imageLimit: options.imageLimit ?? 10,
      roleLimit: options.roleLimit ?? 50,
    };
    this.logger = options.logger ?? silentLogger;
  }

  pageTitle = (driver: Driver, ctx: CollectionContext) => this.text(driver, ctx, 'title', SCRIPTS.title);
  primaryH1 = (driver: Driver, ctx: CollectionContext) => this.text(driver, ctx, 'primary_h1', SCRIPTS.primaryH1);
  headingTexts = (driver: Driver, ctx: CollectionContext) => this.list<string>(driver, ctx, 'headings', SCRIPTS.headings);
  navLinkTexts = (driver: Driver, ctx: CollectionContext) => this.list<string>(driver, ctx, 'nav_links', SCRIPTS.navLinks);
  buttonTexts = (driver: Driver, ctx: CollectionContext) => this.list<string>(driver, ctx, 'buttons', SCRIPTS.buttons);
  bodyText = (driver: Driver, ctx: CollectionContext) =>
    this.text(driver, ctx, 'body_text', SCRIPTS.bodyText, this.options.bodyTextLimit);
  linksMap = (driver: Driver, ctx: CollectionContext) => this.list<LinkEntry>(driver, ctx, 'links', SCRIPTS.links);
  breadcrumbs = (driver: Driver, ctx: CollectionContext) => this.list<string>(driver, ctx, 'breadcrumbs', SCRIPTS.breadcrumbs);
  tabs = (driver: Driver, ctx: CollectionContext) => this.list<TabState>(driver, ctx, 'tabs', SCRIPTS.tabs);
  accordions = (driver: Driver, ctx: CollectionContext) =>
    this.list<AccordionState>(driver, ctx, 'accordions', SCRIPTS.accordions);
  images = (driver: Driver, ctx: CollectionContext) =>
    this.list<ImagePreview>(driver, ctx, 'images', SCRIPTS.images, this.options.imageLimit);
  interactiveRoles = (driver: Driver, ctx: CollectionContext) =>
    this.list<RolePair>(driver, ctx, 'interactive_roles', SCRIPTS.interactiveRoles, this.options.roleLimit);

  formSummary = async (driver: Driver, ctx: CollectionContext): Promise<FormSummary> => {
    const form = await driver.executeScript<FormSummary>(SCRIPTS.formSummary);
    ctx.record('form_inputs', form.inputs.length);
    return form;
  };

  tablePreview = async (driver: Driver, ctx: CollectionContext): Promise<TablePreview> => {
    const table = await driver.executeScript<TablePreview>(SCRIPTS.tablePreview, this.options.tableRowLimit);
    ctx.record('table_rows', table.rows.length);
    return table;
  };

  meta = (driver: Driver, ctx: CollectionContext) => this.object<MetaTags>(driver, ctx, 'meta', SCRIPTS.meta);
  accessibility = (driver: Driver, ctx: CollectionContext) =>
    this.object<AccessibilityCounts>(driver, ctx, 'accessibility', SCRIPTS.accessibility);
  pagination = (driver: Driver, ctx: CollectionContext) =>
    this.object<PaginationState>(driver, ctx, 'pagination', SCRIPTS.pagination);
  widgets = (driver: Driver, ctx: CollectionContext) => this.object<WidgetTexts>(driver, ctx, 'widgets', SCRIPTS.widgets);
  landmarks = (driver: Driver, ctx: CollectionContext) =>
    this.object<Record<string, boolean>>(driver, ctx, 'landmarks', SCRIPTS.landmarks);
  i18n = (driver: Driver, ctx: CollectionContext) => this.object<I18nInfo>(driver, ctx, 'i18n', SCRIPTS.i18n);
  performance = (driver: Driver, ctx: CollectionContext) =>
    this.object<PerformanceTimings>(driver, ctx, 'performance', SCRIPTS.performance);
  listStructure = (driver: Driver, ctx: CollectionContext) =>
    this.object<ListStructure>(driver, ctx, 'list_structure', SCRIPTS.listStructure);
  pageArchitecture = (driver: Driver, ctx: CollectionContext) =>
    this.object<PageArchitecture>(driver, ctx, 'page_architecture', SCRIPTS.pageArchitecture);

  navigationLists = (driver: Driver, ctx: CollectionContext): Promise<ItemCounts> =>
    this.list<number>(driver, ctx, 'navigation_lists', SCRIPTS.navigationLists);
  breadcrumbLists = (driver: Driver, ctx: CollectionContext): Promise<ItemCounts> =>
    this.list<number>(driver, ctx, 'breadcrumb_lists', SCRIPTS.breadcrumbLists);
  featureLists = (driver: Driver, ctx: CollectionContext): Promise<ItemCounts> =>
    this.list<number>(driver, ctx, 'feature_lists', SCRIPTS.featureLists);

  semanticContent = (driver: Driver, ctx: CollectionContext) =>
    this.object<CountProfile>(driver, ctx, 'semantic_content', SCRIPTS.semanticContent);
  semanticElements = (driver: Driver, ctx: CollectionContext) =>
    this.object<OrderedTexts>(driver, ctx, 'semantic_elements', SCRIPTS.semanticElements);
  interactiveElements = (driver: Driver, ctx: CollectionContext) =>
    this.object<CountProfile>(driver, ctx, 'interactive_elements', SCRIPTS.interactiveElements);
  formStructure = (driver: Driver, ctx: CollectionContext) =>
    this.object<CountProfile>(driver, ctx, 'form_structure', SCRIPTS.formStructure);
  formDetails = (driver: Driver, ctx: CollectionContext) =>
    this.object<CountProfile>(driver, ctx, 'form_details', SCRIPTS.formDetails);
  progressIndicators = (driver: Driver, ctx: CollectionContext) =>
    this.object<CountProfile>(driver, ctx, 'progress_indicators', SCRIPTS.progressIndicators);
  graphicsElements = (driver: Driver, ctx: CollectionContext) =>
    this.object<CountProfile>(driver, ctx, 'graphics_elements', SCRIPTS.graphicsElements);

  carousels = (driver: Driver, ctx: CollectionContext): Promise<ItemCounts> =>
    this.list<number>(driver, ctx, 'carousels', SCRIPTS.carousels);
  search = (driver: Driver, ctx: CollectionContext) => this.object<CountProfile>(driver, ctx, 'search', SCRIPTS.search);
  notifications = (driver: Driver, ctx: CollectionContext) =>
    this.object<CountProfile>(driver, ctx, 'notifications', SCRIPTS.notifications);
  loadingStates = (driver: Driver, ctx: CollectionContext) =>
    this.object<CountProfile>(driver, ctx, 'loading_states', SCRIPTS.loadingStates);
  socialMedia = (driver: Driver, ctx: CollectionContext) =>
    this.object<CountProfile>(driver, ctx, 'social_media', SCRIPTS.socialMedia);
  mediaElements = (driver: Driver, ctx: CollectionContext) =>
    this.object<CountProfile>(driver, ctx, 'media_elements', SCRIPTS.mediaElements);

  dataAttributes = (driver: Driver, ctx: CollectionContext) =>
    this.object<CountProfile>(driver, ctx, 'data_attributes', SCRIPTS.dataAttributes);
  customElements = (driver: Driver, ctx: CollectionContext) =>
    this.list<string>(driver, ctx, 'custom_elements', SCRIPTS.customElements);
  analytics = (driver: Driver, ctx: CollectionContext) =>
    this.object<Record<string, boolean>>(driver, ctx, 'analytics', SCRIPTS.analytics);
  errorStates = (driver: Driver, ctx: CollectionContext) =>
    this.object<CountProfile>(driver, ctx, 'error_states', SCRIPTS.errorStates);
  themeColors = (driver: Driver, ctx: CollectionContext) =>
    this.object<ThemePalette>(driver, ctx, 'theme_colors', SCRIPTS.themeColors);

  /** Texts per element kind in document order, each cut to `orderedTextLimit`. */
  orderedPage = async (driver: Driver, ctx: CollectionContext): Promise<OrderedPage> => {
    const page = await driver.executeScript<OrderedPage>(SCRIPTS.orderedPage, this.options.orderedTextLimit);
    ctx.record('ordered_elements', Object.values(page.elements).reduce((sum, texts) => sum + texts.length, 0));
    return page;
  };

  iframeReport = async (driver: Driver, ctx: CollectionContext): Promise<IframeReport> => {
    const report = await driver.executeScript<IframeReport>(SCRIPTS.iframes);
    ctx.record('iframes', report.summary.total_iframes);
    this.logger.debug(
      `[${ctx.side}] iframes: ${report.summary.accessible_iframes}/${report.summary.total_iframes} accessible, ` +
        `${report.summary.total_elements} elements`
    );
    return report;
  };

  async removeIgnored(driver: Driver, selectors: string[]): Promise<number> {
    if (selectors.length === 0) return 0;
    const removed = await driver.executeScript<number>(SCRIPTS.removeIgnored, selectors);
    this.logger.debug(`Removed ${removed} elements matching ${selectors.length} ignored selectors`);
    return removed;
  }

  private async text(driver: Driver, ctx: CollectionContext, kind: string, body: string, ...args: unknown[]) {
    const value = (await driver.executeScript<string | null>(body, ...args)) ?? '';
    ctx.record(kind, value ? 1 : 0);
    return value;
  }

  private async list<T>(driver: Driver, ctx: CollectionContext, kind: string, body: string, ...args: unknown[]) {
    const items = (await driver.executeScript<T[] | null>(body, ...args)) ?? [];
    ctx.record(kind, items.length);
    this.logger.debug(`[${ctx.side}] ${kind}: ${items.length} items`);
    return items;
  }

  private async object<T extends object>(driver: Driver, ctx: CollectionContext, kind: string, body: string) {
    const value = await driver.executeScript<T>(body);
    ctx.record(kind, 1);
    return value;
  }
}
